import { Result } from '@badrap/result'
import { CompactMove, MoveCodecError, decodeMove } from './compact'
import { disambiguate } from './disambiguation'
import { NumeralStyle, renderFile, renderRank } from './numerals'
import { Position } from './position'
import { SquareSet } from './squareSet'
import { ByRole, DropMove, Move, NormalMove, Piece, Square, isDrop } from './types'
import { defined, inPromotionZone, isDeadEnd, isPromotable, isSquare, squareFile, squareRank } from './util'

export enum InvalidKifu {
    Square = 'ERR_SQUARE',
    EmptyOrigin = 'ERR_EMPTY_ORIGIN',
    EmptyHand = 'ERR_EMPTY_HAND',
    Turn = 'ERR_TURN',
    Illegal = 'ERR_ILLEGAL',
    Ambiguous = 'ERR_AMBIGUOUS',
}

export class KifuError extends Error {}


/**
 * `always` writes 打 on every drop, `ambiguous` only where a piece on the
 * board could make the same move.
 */
export type DropMarker = 'always' | 'ambiguous'

export interface KifuOpts {
    numerals?: NumeralStyle;
    dropMarker?: DropMarker;
    sideMarker?: boolean;
}


export const ROLE_KANJI: ByRole<string> = {
    king: '玉',
    rook: '飛',
    bishop: '角',
    gold: '金',
    silver: '銀',
    knight: '桂',
    lance: '香',
    pawn: '歩',
    dragon: '竜',
    horse: '馬',
    promotedsilver: '成銀',
    promotedknight: '成桂',
    promotedlance: '成香',
    tokin: 'と',
}

const SAME_SQUARE = '同'
// keeps the shorthand two characters wide without a side marker
const IDEOGRAPHIC_SPACE = '　'
const PROMOTE = '成'
const NO_PROMOTE = '不成'
const DROP = '打'


/**
 * Squares of the side to move's pieces like `piece` that can move to `to`.
 */
const movers = (pos: Position, piece: Piece, to: Square): SquareSet => {
    let res = SquareSet.empty()
    for (const from of pos.pieces(piece.color, piece.role)) {
        if (pos.dests(from).has(to)) res = res.with(from)
    }
    return res
}


const couldPromote = (piece: Piece, move: NormalMove): boolean =>
    isPromotable(piece.role) && (inPromotionZone(piece.color, move.from) || inPromotionZone(piece.color, move.to))


const canMoveTo = (pos: Position, piece: Piece, move: NormalMove): boolean => {
    if (!pos.dests(move.from).has(move.to)) return false
    if (move.promotion) return couldPromote(piece, move)
    return !isDeadEnd(piece.color, piece.role, move.to)
}


const normalBody = (pos: Position, move: NormalMove): Result<string, KifuError> => {

    const piece = pos.pieceAt(move.from)
    if (!piece) return Result.err(new KifuError(InvalidKifu.EmptyOrigin))
    if (piece.color !== pos.turn) return Result.err(new KifuError(InvalidKifu.Turn))
    if (!canMoveTo(pos, piece, move)) return Result.err(new KifuError(InvalidKifu.Illegal))

    const qualifier = disambiguate(piece.color, piece.role, move.from, move.to, movers(pos, piece, move.to))
    if (!defined(qualifier)) return Result.err(new KifuError(InvalidKifu.Ambiguous))

    let kifu = ROLE_KANJI[piece.role] + qualifier
    if (move.promotion) kifu += PROMOTE
    else if (couldPromote(piece, move)) kifu += NO_PROMOTE
    return Result.ok(kifu)
}


const dropBody = (pos: Position, move: DropMove, opts?: KifuOpts): Result<string, KifuError> => {

    if (pos.hand(pos.turn).get(move.role) === 0) return Result.err(new KifuError(InvalidKifu.EmptyHand))
    if (pos.occupied().has(move.to) || isDeadEnd(pos.turn, move.role, move.to)) {
        return Result.err(new KifuError(InvalidKifu.Illegal))
    }

    let kifu = ROLE_KANJI[move.role]
    const piece = { role: move.role, color: pos.turn }
    if ((opts?.dropMarker ?? 'always') === 'always' || movers(pos, piece, move.to).nonEmpty()) kifu += DROP
    return Result.ok(kifu)
}


const destination = (pos: Position, to: Square, opts?: KifuOpts): string => {
    const sideMarker = opts?.sideMarker ?? true
    if (defined(pos.lastMove) && pos.lastMove.to === to) return sideMarker ? SAME_SQUARE : SAME_SQUARE + IDEOGRAPHIC_SPACE
    const style = opts?.numerals ?? 'arabic'
    return renderFile(squareFile(to)) + renderRank(squareRank(to), style)
}


/**
 * The official kifu notation of `move`, e.g. `▲７六歩`, `△同銀`, `▲５二金直`,
 * `▲２三角成`.
 *
 * Fails without output when the move does not fit the position: a square
 * off the board, no piece to move, an empty hand, a piece of the side not to
 * move, a move the piece cannot make, or like pieces the marks cannot tell
 * apart.
 */
export const makeKifu = (pos: Position, move: Move, opts?: KifuOpts): Result<string, KifuError> => {

    if (!isSquare(move.to) || (!isDrop(move) && !isSquare(move.from))) {
        return Result.err(new KifuError(InvalidKifu.Square))
    }

    const body = isDrop(move) ? dropBody(pos, move, opts) : normalBody(pos, move)

    return body.map(body => {
        const side = (opts?.sideMarker ?? true) ? (pos.turn === 'black' ? '▲' : '△') : ''
        return side + destination(pos, move.to, opts) + body
    })
}


/**
 * `makeKifu` for a move in its 16 bit form.
 */
export const makeKifuFromCompact = (
    pos: Position,
    value: CompactMove,
    opts?: KifuOpts,
): Result<string, KifuError | MoveCodecError> => {
    const move = decodeMove(value)
    if (move.isErr) return Result.err(move.error)
    return makeKifu(pos, move.value, opts)
}


export interface KifuWriter {
    readonly opts: Readonly<KifuOpts>;
    write(pos: Position, move: Move): Result<string, KifuError>;
    writeCompact(pos: Position, value: CompactMove): Result<string, KifuError | MoveCodecError>;
}

/**
 * Binds one set of options, numeral style included, for every move written
 * through it.
 */
export const kifuWriter = (opts: KifuOpts = {}): KifuWriter => {
    const frozen = Object.freeze({ ...opts })
    return {
        opts: frozen,
        write: (pos, move) => makeKifu(pos, move, frozen),
        writeCompact: (pos, value) => makeKifuFromCompact(pos, value, frozen),
    }
}
