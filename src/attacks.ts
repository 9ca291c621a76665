import { SquareSet } from './squareSet'
import { ByColor, Color, Piece, Square } from './types'
import { squareFile, squareFromCoords, squareRank } from './util'

type Delta = readonly [file: number, rank: number]

// written for black, who heads toward rank 1
const PAWN_DELTAS: Delta[] = [[0, -1]]
const KNIGHT_DELTAS: Delta[] = [[-1, -2], [1, -2]]
const SILVER_DELTAS: Delta[] = [[-1, -1], [0, -1], [1, -1], [-1, 1], [1, 1]]
const GOLD_DELTAS: Delta[] = [[-1, -1], [0, -1], [1, -1], [-1, 0], [1, 0], [0, 1]]
const DIAGONAL_DELTAS: Delta[] = [[-1, -1], [1, -1], [-1, 1], [1, 1]]
const ORTHOGONAL_DELTAS: Delta[] = [[0, -1], [-1, 0], [1, 0], [0, 1]]
const KING_DELTAS: Delta[] = [...DIAGONAL_DELTAS, ...ORTHOGONAL_DELTAS]


const forColor = (color: Color, [df, dr]: Delta): Delta => (color === 'black' ? [df, dr] : [-df, -dr])

const step = (square: Square, [df, dr]: Delta): Square | undefined =>
    squareFromCoords(squareFile(square) + df, squareRank(square) + dr)


const computeStepTable = (color: Color, deltas: Delta[]): SquareSet[] => {
    const table: SquareSet[] = []
    for (let square = 0; square < 81; square++) {
        let set = SquareSet.empty()
        for (const delta of deltas) {
            const to = step(square, forColor(color, delta))
            if (to !== undefined) set = set.with(to)
        }
        table[square] = set
    }
    return table
}

const byColor = (deltas: Delta[]): ByColor<SquareSet[]> => ({
    black: computeStepTable('black', deltas),
    white: computeStepTable('white', deltas),
})

const PAWN_ATTACKS = byColor(PAWN_DELTAS)
const KNIGHT_ATTACKS = byColor(KNIGHT_DELTAS)
const SILVER_ATTACKS = byColor(SILVER_DELTAS)
const GOLD_ATTACKS = byColor(GOLD_DELTAS)
const KING_ATTACKS = computeStepTable('black', KING_DELTAS)


/**
 * Squares along `delta` up to and including the first occupied one.
 */
const ray = (square: Square, delta: Delta, occupied: SquareSet): SquareSet => {
    let set = SquareSet.empty()
    let to = step(square, delta)
    while (to !== undefined) {
        set = set.with(to)
        if (occupied.has(to)) break
        to = step(to, delta)
    }
    return set
}

const slide = (square: Square, deltas: Delta[], occupied: SquareSet): SquareSet =>
    deltas.reduce((acc, delta) => acc.union(ray(square, delta, occupied)), SquareSet.empty())


export const pawnAttacks = (color: Color, square: Square): SquareSet => PAWN_ATTACKS[color][square]

export const knightAttacks = (color: Color, square: Square): SquareSet => KNIGHT_ATTACKS[color][square]

export const silverAttacks = (color: Color, square: Square): SquareSet => SILVER_ATTACKS[color][square]

export const goldAttacks = (color: Color, square: Square): SquareSet => GOLD_ATTACKS[color][square]

export const kingAttacks = (square: Square): SquareSet => KING_ATTACKS[square]

export const lanceAttacks = (color: Color, square: Square, occupied: SquareSet): SquareSet =>
    ray(square, forColor(color, PAWN_DELTAS[0]), occupied)

export const bishopAttacks = (square: Square, occupied: SquareSet): SquareSet =>
    slide(square, DIAGONAL_DELTAS, occupied)

export const rookAttacks = (square: Square, occupied: SquareSet): SquareSet =>
    slide(square, ORTHOGONAL_DELTAS, occupied)

export const horseAttacks = (square: Square, occupied: SquareSet): SquareSet =>
    bishopAttacks(square, occupied).union(kingAttacks(square))

export const dragonAttacks = (square: Square, occupied: SquareSet): SquareSet =>
    rookAttacks(square, occupied).union(kingAttacks(square))


/**
 * Squares `piece` on `square` reaches in one move, own pieces included.
 */
export const attacks = (piece: Piece, square: Square, occupied: SquareSet): SquareSet => {
    switch (piece.role) {
        case 'pawn':
            return pawnAttacks(piece.color, square)
        case 'lance':
            return lanceAttacks(piece.color, square, occupied)
        case 'knight':
            return knightAttacks(piece.color, square)
        case 'silver':
            return silverAttacks(piece.color, square)
        case 'gold':
        case 'tokin':
        case 'promotedlance':
        case 'promotedknight':
        case 'promotedsilver':
            return goldAttacks(piece.color, square)
        case 'bishop':
            return bishopAttacks(square, occupied)
        case 'rook':
            return rookAttacks(square, occupied)
        case 'horse':
            return horseAttacks(square, occupied)
        case 'dragon':
            return dragonAttacks(square, occupied)
        case 'king':
            return kingAttacks(square)
    }
}
