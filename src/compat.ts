import { Result } from '@badrap/result'
import { Board } from './board'
import { CompactMove, MoveCodecError, NO_MOVE, decodeMove, encodeMove } from './compact'
import { Hand } from './hand'
import { KifuError, KifuOpts, makeKifuFromCompact } from './kifu'
import { Position, PositionError } from './position'
import { SquareSet } from './squareSet'
import { ByColor, COLORS, Color, HAND_ROLES, Move, Piece, ROLES, Square } from './types'
import { defined, idToRole, isSquare, roleToId } from './util'

/*
 * Byte layout shared with callers across a language boundary, little endian:
 *
 *   0  side             u8, black 1, white 2
 *   2  ply              u16
 *   4  hands[2]         8 bytes each, count of kind id - 1
 *  20  board[81]        OptionPiece
 * 104  player bb[2]     two u64 words each
 * 136  piece bb[14]     kind id order
 * 360  last move        OptionCompactMove, u16
 * 362  king squares[2]  OptionSquare
 */
export const POSITION_SIZE = 368

const SIDE_OFFSET = 0
const PLY_OFFSET = 2
const HANDS_OFFSET = 4
const BOARD_OFFSET = 20
const PLAYER_BB_OFFSET = 104
const PIECE_BB_OFFSET = 136
const LAST_MOVE_OFFSET = 360
const KINGS_OFFSET = 362

const HAND_SIZE = 8
const BITBOARD_SIZE = 16
const WHITE_PIECE_OFFSET = 16

export enum InvalidLayout {
    Size = 'ERR_SIZE',
    Side = 'ERR_SIDE',
    Hand = 'ERR_HAND',
    Piece = 'ERR_PIECE',
    Bitboard = 'ERR_BITBOARD',
    King = 'ERR_KING',
}

export class LayoutError extends Error {}

export type UnpackError = LayoutError | PositionError | MoveCodecError


export const colorToId = (color: Color): number => (color === 'black' ? 1 : 2)

export const idToColor = (id: number): Color | undefined => (id === 1 ? 'black' : id === 2 ? 'white' : undefined)


/** 0 for an empty square */
export const makeOptionPiece = (piece: Piece | undefined): number =>
    piece ? roleToId(piece.role) + (piece.color === 'white' ? WHITE_PIECE_OFFSET : 0) : 0

export const parseOptionPiece = (byte: number): Piece | undefined => {
    const color = byte & WHITE_PIECE_OFFSET ? 'white' : 'black'
    const role = idToRole(byte & ~WHITE_PIECE_OFFSET)
    return role && byte < 2 * WHITE_PIECE_OFFSET ? { role, color } : undefined
}


/** 0 for no square, `square + 1` otherwise */
export const makeOptionSquare = (square: Square | undefined): number => (defined(square) ? square + 1 : 0)

export const parseOptionSquare = (byte: number): Square | undefined => (isSquare(byte - 1) ? byte - 1 : undefined)


export const makeOptionCompactMove = (move: Move | undefined): Result<CompactMove, MoveCodecError> =>
    move ? encodeMove(move) : Result.ok(NO_MOVE)

export const parseOptionCompactMove = (value: CompactMove): Result<Move | undefined, MoveCodecError> =>
    value === NO_MOVE ? Result.ok(undefined) : decodeMove(value)


const WORD_MASK = (1n << 27n) - 1n
const LOW_WORD_BITS = 63n
const LOW_WORD_MASK = (1n << LOW_WORD_BITS) - 1n

/**
 * Squares 0..62 in the first word, 63..80 in the second.
 */
export const squareSetToWords = (set: SquareSet): [bigint, bigint] => {
    const value = BigInt(set.lo) | (BigInt(set.mid) << 27n) | (BigInt(set.hi) << 54n)
    return [value & LOW_WORD_MASK, value >> LOW_WORD_BITS]
}

export const squareSetFromWords = (low: bigint, high: bigint): SquareSet => {
    const value = (low & LOW_WORD_MASK) | (high << LOW_WORD_BITS)
    return new SquareSet(Number(value & WORD_MASK), Number((value >> 27n) & WORD_MASK), Number((value >> 54n) & WORD_MASK))
}


const writeSquareSet = (view: DataView, offset: number, set: SquareSet): void => {
    const [low, high] = squareSetToWords(set)
    view.setBigUint64(offset, low, true)
    view.setBigUint64(offset + 8, high, true)
}

const matchesSquareSet = (view: DataView, offset: number, set: SquareSet): boolean => {
    const [low, high] = squareSetToWords(set)
    return view.getBigUint64(offset, true) === low && view.getBigUint64(offset + 8, true) === high
}


export const packPosition = (pos: Position): Uint8Array => {
    const bytes = new Uint8Array(POSITION_SIZE)
    const view = new DataView(bytes.buffer)

    view.setUint8(SIDE_OFFSET, colorToId(pos.turn))
    view.setUint16(PLY_OFFSET, pos.ply, true)

    COLORS.forEach((color, i) => {
        for (const [role, count] of pos.hand(color)) {
            bytes[HANDS_OFFSET + i * HAND_SIZE + roleToId(role) - 1] = count
        }
        writeSquareSet(view, PLAYER_BB_OFFSET + i * BITBOARD_SIZE, pos.occupied(color))
    })

    for (let square = 0; square < 81; square++) {
        bytes[BOARD_OFFSET + square] = makeOptionPiece(pos.pieceAt(square))
    }

    for (const role of ROLES) {
        writeSquareSet(view, PIECE_BB_OFFSET + (roleToId(role) - 1) * BITBOARD_SIZE, pos.roleSquares(role))
    }

    // a Position only holds last moves that encode
    view.setUint16(LAST_MOVE_OFFSET, makeOptionCompactMove(pos.lastMove).unwrap(), true)

    COLORS.forEach((color, i) => {
        bytes[KINGS_OFFSET + i] = makeOptionSquare(pos.kingOf(color))
    })

    return bytes
}


export const unpackPosition = (bytes: Uint8Array): Result<Position, UnpackError> => {

    if (bytes.length < POSITION_SIZE) return Result.err(new LayoutError(InvalidLayout.Size))
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    const turn = idToColor(view.getUint8(SIDE_OFFSET))
    if (!turn) return Result.err(new LayoutError(InvalidLayout.Side))

    const hands: ByColor<Hand> = { black: Hand.empty(), white: Hand.empty() }
    for (let i = 0; i < COLORS.length; i++) {
        const offset = HANDS_OFFSET + i * HAND_SIZE
        if (bytes[offset + HAND_SIZE - 1] !== 0) return Result.err(new LayoutError(InvalidLayout.Hand))
        for (const role of HAND_ROLES) {
            hands[COLORS[i]].set(role, bytes[offset + roleToId(role) - 1])
        }
    }

    const board = Board.empty()
    for (let square = 0; square < 81; square++) {
        const byte = bytes[BOARD_OFFSET + square]
        if (byte === 0) continue
        const piece = parseOptionPiece(byte)
        if (!piece) return Result.err(new LayoutError(InvalidLayout.Piece))
        board.set(square, piece)
    }

    for (let i = 0; i < COLORS.length; i++) {
        if (!matchesSquareSet(view, PLAYER_BB_OFFSET + i * BITBOARD_SIZE, board[COLORS[i]])) {
            return Result.err(new LayoutError(InvalidLayout.Bitboard))
        }
    }
    for (const role of ROLES) {
        if (!matchesSquareSet(view, PIECE_BB_OFFSET + (roleToId(role) - 1) * BITBOARD_SIZE, board.roles[role])) {
            return Result.err(new LayoutError(InvalidLayout.Bitboard))
        }
    }

    for (let i = 0; i < COLORS.length; i++) {
        const byte = bytes[KINGS_OFFSET + i]
        const king = parseOptionSquare(byte)
        if ((byte !== 0 && !defined(king)) || king !== board.kingOf(COLORS[i])) {
            return Result.err(new LayoutError(InvalidLayout.King))
        }
    }

    const lastMove = parseOptionCompactMove(view.getUint16(LAST_MOVE_OFFSET, true))
    if (lastMove.isErr) return Result.err(lastMove.error)

    return Position.fromSetup({
        board,
        hands,
        turn,
        ply: view.getUint16(PLY_OFFSET, true),
        lastMove: lastMove.value,
    })
}


/**
 * Writes the kifu of the 16 bit move `value` against a position in the byte
 * layout above.
 */
export const displayCompactMove = (
    bytes: Uint8Array,
    value: CompactMove,
    opts?: KifuOpts,
): Result<string, UnpackError | KifuError> => {
    const pos = unpackPosition(bytes)
    if (pos.isErr) return Result.err(pos.error)
    return makeKifuFromCompact(pos.value, value, opts)
}
