import { Result } from '@badrap/result'
import { attacks } from './attacks'
import { Board } from './board'
import { encodeMove } from './compact'
import { Hand } from './hand'
import { Setup, defaultSetup, setupClone } from './setup'
import { SquareSet } from './squareSet'
import { ByColor, ByHandRole, COLORS, Color, HAND_ROLES, Move, Piece, ROLES, Role, Square } from './types'
import { defined, isDeadEnd, opposite, unpromote } from './util'

export enum IllegalSetup {
    Kings = 'ERR_KINGS',
    DeadPiece = 'ERR_DEAD_PIECE',
    PieceCount = 'ERR_PIECE_COUNT',
    Ply = 'ERR_PLY',
    LastMove = 'ERR_LAST_MOVE',
}


export class PositionError extends Error {}


/** pieces of each kind in a set, promoted ones counted as their base */
export const PIECE_LIMITS: ByHandRole<number> = {
    rook: 2,
    bishop: 2,
    gold: 4,
    silver: 4,
    knight: 4,
    lance: 4,
    pawn: 18,
}

// ply is stored as an unsigned 16 bit integer
const MAX_PLY = 0xffff


/**
 * A shogi position the notation is written against. Built once from a
 * `Setup` and only read afterwards: reads hand out copies.
 */
export class Position {

    private constructor(
        private readonly placement: Board,
        private readonly hands: ByColor<Hand>,
        readonly turn: Color,
        readonly ply: number,
        private readonly previous: Move | undefined,
        private readonly kings: ByColor<Square | undefined>,
    ) {}

    static default(): Position {
        return Position.fromSetupUnchecked(defaultSetup())
    }

    static fromSetup(setup: Setup): Result<Position, PositionError> {
        const pos = Position.fromSetupUnchecked(setup)
        return pos.validate().map(_ => pos)
    }

    private static fromSetupUnchecked(setup: Setup): Position {
        const { board, hands, turn, ply, lastMove } = setupClone(setup)
        return new Position(board, hands, turn, ply, lastMove, {
            black: board.kingOf('black'),
            white: board.kingOf('white'),
        })
    }

    private validate(): Result<undefined, PositionError> {

        if (!Number.isInteger(this.ply) || this.ply < 1 || this.ply > MAX_PLY) {
            return Result.err(new PositionError(IllegalSetup.Ply))
        }

        if (defined(this.lastMove) && encodeMove(this.lastMove).isErr) {
            return Result.err(new PositionError(IllegalSetup.LastMove))
        }

        for (const color of COLORS) {
            if (this.placement.pieces(color, 'king').moreThanOne()) return Result.err(new PositionError(IllegalSetup.Kings))
        }

        for (const [square, piece] of this.placement) {
            if (isDeadEnd(piece.color, piece.role, square)) return Result.err(new PositionError(IllegalSetup.DeadPiece))
        }

        for (const role of HAND_ROLES) {
            let count = this.hands.black.get(role) + this.hands.white.get(role)
            for (const r of ROLES) {
                if (r === role || unpromote(r) === role) count += this.placement.roles[r].size()
            }
            if (count > PIECE_LIMITS[role]) return Result.err(new PositionError(IllegalSetup.PieceCount))
        }

        return Result.ok(undefined)
    }

    clone(): Position {
        return Position.fromSetupUnchecked(this.toSetup())
    }

    toSetup(): Setup {
        return setupClone({
            board: this.placement,
            hands: this.hands,
            turn: this.turn,
            ply: this.ply,
            lastMove: this.lastMove,
        })
    }

    get lastMove(): Move | undefined {
        return this.previous && { ...this.previous }
    }

    /** a copy of the placement */
    get board(): Board {
        return this.placement.clone()
    }

    pieceAt(square: Square): Piece | undefined {
        return this.placement.get(square)
    }

    /** a copy of the pieces in hand of `color` */
    hand(color: Color): Hand {
        return this.hands[color].clone()
    }

    /** all occupied squares, or those of one color */
    occupied(color?: Color): SquareSet {
        return color ? this.placement[color] : this.placement.occupied
    }

    /** squares of `role` for both colors */
    roleSquares(role: Role): SquareSet {
        return this.placement.roles[role]
    }

    pieces(color: Color, role: Role): SquareSet {
        return this.placement.pieces(color, role)
    }

    kingOf(color: Color): Square | undefined {
        return this.kings[color]
    }


    /**
     * Whether a piece of `attacker` reaches `square`, sliding pieces blocked by
     * `occupied`. Pieces on `captured` are gone and do not attack.
     */
    isAttacked(
        square: Square,
        attacker: Color,
        occupied: SquareSet = this.placement.occupied,
        captured: SquareSet = SquareSet.empty(),
    ): boolean {
        for (const from of this.placement[attacker].diff(captured)) {
            const piece = this.placement.get(from)
            if (piece && attacks(piece, from, occupied).has(square)) return true
        }
        return false
    }


    /**
     * Destinations of the piece on `square` for the side to move: its movement
     * pattern, minus own pieces, minus moves that leave the own king attacked.
     */
    dests(square: Square): SquareSet {

        const piece = this.placement.get(square)
        if (!piece || piece.color !== this.turn) return SquareSet.empty()

        const pseudo = attacks(piece, square, this.placement.occupied).diff(this.placement[this.turn])

        const king = this.kings[this.turn]
        if (!defined(king)) return pseudo

        let legal = SquareSet.empty()
        for (const to of pseudo) {
            const occupied = this.placement.occupied.without(square).with(to)
            const target = piece.role === 'king' ? to : king
            if (!this.isAttacked(target, opposite(this.turn), occupied, SquareSet.fromSquare(to))) {
                legal = legal.with(to)
            }
        }
        return legal
    }
}
