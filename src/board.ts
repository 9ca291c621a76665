import { SquareSet } from './squareSet'
import { BySquare, ByRole, COLORS, Color, Piece, ROLES, Role, Square } from './types'
import { defined } from './util'

const emptyRoleSets = (): ByRole<SquareSet> => ({
    pawn: SquareSet.empty(),
    lance: SquareSet.empty(),
    knight: SquareSet.empty(),
    silver: SquareSet.empty(),
    gold: SquareSet.empty(),
    bishop: SquareSet.empty(),
    rook: SquareSet.empty(),
    king: SquareSet.empty(),
    tokin: SquareSet.empty(),
    promotedlance: SquareSet.empty(),
    promotedknight: SquareSet.empty(),
    promotedsilver: SquareSet.empty(),
    horse: SquareSet.empty(),
    dragon: SquareSet.empty(),
})

const BACK_RANK: Role[] = ['lance', 'knight', 'silver', 'gold', 'king', 'gold', 'silver', 'knight', 'lance']


/**
 * Piece placement, kept both as a square array and as square sets per color
 * and per role. `set` and `take` update all of them together.
 */
export class Board implements Iterable<[Square, Piece]> {

    occupied: SquareSet
    black: SquareSet
    white: SquareSet
    roles: ByRole<SquareSet>

    private squares: BySquare<Piece | undefined>

    private constructor() {
        this.occupied = SquareSet.empty()
        this.black = SquareSet.empty()
        this.white = SquareSet.empty()
        this.roles = emptyRoleSets()
        this.squares = new Array<Piece | undefined>(81).fill(undefined)
    }

    static empty(): Board {
        return new Board()
    }

    static default(): Board {
        const board = new Board()
        const square = (file: number, rank: number): Square => (file - 1) * 9 + rank - 1
        for (let file = 1; file <= 9; file++) {
            board.set(square(file, 9), { role: BACK_RANK[file - 1], color: 'black' })
            board.set(square(file, 7), { role: 'pawn', color: 'black' })
            board.set(square(file, 3), { role: 'pawn', color: 'white' })
            board.set(square(file, 1), { role: BACK_RANK[file - 1], color: 'white' })
        }
        board.set(square(8, 8), { role: 'bishop', color: 'black' })
        board.set(square(2, 8), { role: 'rook', color: 'black' })
        board.set(square(8, 2), { role: 'rook', color: 'white' })
        board.set(square(2, 2), { role: 'bishop', color: 'white' })
        return board
    }

    clone(): Board {
        const board = new Board()
        board.occupied = this.occupied
        board.black = this.black
        board.white = this.white
        board.roles = { ...this.roles }
        board.squares = this.squares.map(p => p && { ...p })
        return board
    }

    get(square: Square): Piece | undefined {
        const piece = this.squares[square]
        return piece && { ...piece }
    }

    getColor(square: Square): Color | undefined {
        return this.squares[square]?.color
    }

    getRole(square: Square): Role | undefined {
        return this.squares[square]?.role
    }

    has(square: Square): boolean {
        return this.occupied.has(square)
    }

    /**
     * Removes and returns the piece on `square`.
     */
    take(square: Square): Piece | undefined {
        const piece = this.squares[square]
        if (piece) {
            this.occupied = this.occupied.without(square)
            this[piece.color] = this[piece.color].without(square)
            this.roles[piece.role] = this.roles[piece.role].without(square)
            this.squares[square] = undefined
        }
        return piece
    }

    /**
     * Puts `piece` on `square`, returning what was there before.
     */
    set(square: Square, piece: Piece): Piece | undefined {
        const old = this.take(square)
        this.occupied = this.occupied.with(square)
        this[piece.color] = this[piece.color].with(square)
        this.roles[piece.role] = this.roles[piece.role].with(square)
        this.squares[square] = { ...piece }
        return old
    }

    pieces(color: Color, role: Role): SquareSet {
        return this[color].intersect(this.roles[role])
    }

    kingOf(color: Color): Square | undefined {
        return this.pieces(color, 'king').singleSquare()
    }

    *[Symbol.iterator](): Iterator<[Square, Piece]> {
        for (const square of this.occupied) {
            const piece = this.squares[square]
            if (piece) yield [square, { ...piece }]
        }
    }
}


export const boardEquals = (left: Board, right: Board): boolean =>
    left.black.equals(right.black)
    && left.white.equals(right.white)
    && ROLES.every(role => left.roles[role].equals(right.roles[role]))


/**
 * Whether the square array and the square sets describe the same placement.
 */
export const isConsistent = (board: Board): boolean => {
    if (board.black.intersects(board.white)) return false
    if (!board.black.union(board.white).equals(board.occupied)) return false
    const byRole = ROLES.reduce((acc, role) => acc.union(board.roles[role]), SquareSet.empty())
    if (!byRole.equals(board.occupied)) return false
    for (let square = 0; square < 81; square++) {
        const piece = board.get(square)
        for (const color of COLORS) {
            for (const role of ROLES) {
                const expected = defined(piece) && piece.color === color && piece.role === role
                if (board.pieces(color, role).has(square) !== expected) return false
            }
        }
    }
    return true
}
