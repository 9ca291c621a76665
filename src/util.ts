import {
    ByRole,
    Color,
    FILE_NAMES,
    HAND_ROLES,
    HandRole,
    Move,
    RANK_NAMES,
    ROLES,
    Role,
    Square,
    SquareName,
    isDrop,
} from './types'

export const defined = <A>(v: A | undefined): v is A => v !== undefined

export const opposite = (color: Color): Color => (color === 'black' ? 'white' : 'black')


export const isSquare = (square: number): square is Square =>
    Number.isInteger(square) && 0 <= square && square < 81

/** 1..9, counted from black's right */
export const squareFile = (square: Square): number => Math.floor(square / 9) + 1

/** 1..9, counted from white's side */
export const squareRank = (square: Square): number => (square % 9) + 1

/**
 * Rank as seen by `color`: 1 is the far rank it is heading to.
 */
export const relativeRank = (color: Color, square: Square): number => {
    const rank = squareRank(square)
    return color === 'black' ? rank : 10 - rank
}

export const squareFromCoords = (file: number, rank: number): Square | undefined =>
    1 <= file && file <= 9 && 1 <= rank && rank <= 9 ? (file - 1) * 9 + (rank - 1) : undefined


export function parseSquare(str: SquareName): Square
export function parseSquare(str: string): Square | undefined
export function parseSquare(str: string): Square | undefined {
    if (str.length !== 2) return
    return squareFromCoords(str.charCodeAt(0) - '0'.charCodeAt(0), str.charCodeAt(1) - 'a'.charCodeAt(0) + 1)
}

export const makeSquare = (square: Square): SquareName =>
    `${FILE_NAMES[squareFile(square) - 1]}${RANK_NAMES[squareRank(square) - 1]}`


const PROMOTIONS: Partial<Record<Role, Role>> = {
    pawn: 'tokin',
    lance: 'promotedlance',
    knight: 'promotedknight',
    silver: 'promotedsilver',
    bishop: 'horse',
    rook: 'dragon',
}

const UNPROMOTIONS: Partial<Record<Role, Role>> = {
    tokin: 'pawn',
    promotedlance: 'lance',
    promotedknight: 'knight',
    promotedsilver: 'silver',
    horse: 'bishop',
    dragon: 'rook',
}

export const promote = (role: Role): Role | undefined => PROMOTIONS[role]

export const unpromote = (role: Role): Role | undefined => UNPROMOTIONS[role]

export const isPromotable = (role: Role): boolean => defined(promote(role))

export const isHandRole = (role: Role): role is HandRole => HAND_ROLES.some(r => r === role)


/**
 * Pawns and lances on the last rank and knights on the last two ranks would
 * never move again.
 */
export const isDeadEnd = (color: Color, role: Role, square: Square): boolean => {
    const rank = relativeRank(color, square)
    if (role === 'pawn' || role === 'lance') return rank === 1
    if (role === 'knight') return rank <= 2
    return false
}

/** the last three ranks of the opponent's side */
export const inPromotionZone = (color: Color, square: Square): boolean => relativeRank(color, square) <= 3


const ROLE_IDS: ByRole<number> = {
    pawn: 1,
    lance: 2,
    knight: 3,
    silver: 4,
    gold: 5,
    bishop: 6,
    rook: 7,
    king: 8,
    tokin: 9,
    promotedlance: 10,
    promotedknight: 11,
    promotedsilver: 12,
    horse: 13,
    dragon: 14,
}

export const roleToId = (role: Role): number => ROLE_IDS[role]

export const idToRole = (id: number): Role | undefined => (Number.isInteger(id) ? ROLES[id - 1] : undefined)


export const roleToChar = (role: HandRole | 'king'): string => {
    switch (role) {
        case 'pawn':
            return 'p'
        case 'lance':
            return 'l'
        case 'knight':
            return 'n'
        case 'silver':
            return 's'
        case 'gold':
            return 'g'
        case 'bishop':
            return 'b'
        case 'rook':
            return 'r'
        case 'king':
            return 'k'
    }
}

export function charToRole(ch: 'P' | 'L' | 'N' | 'S' | 'G' | 'B' | 'R' | 'K' | 'p' | 'l' | 'n' | 's' | 'g' | 'b' | 'r' | 'k'): HandRole | 'king'
export function charToRole(ch: string): HandRole | 'king' | undefined
export function charToRole(ch: string): HandRole | 'king' | undefined {
    switch (ch.toLowerCase()) {
        case 'p':
            return 'pawn'
        case 'l':
            return 'lance'
        case 'n':
            return 'knight'
        case 's':
            return 'silver'
        case 'g':
            return 'gold'
        case 'b':
            return 'bishop'
        case 'r':
            return 'rook'
        case 'k':
            return 'king'
        default:
            return
    }
}


/* 7g7f, 8h2b+, P*5e */
export const parseUsi = (str: string): Move | undefined => {
    if (str[1] === '*' && str.length === 4) {
        const role = charToRole(str[0])
        const to = parseSquare(str.slice(2))
        if (!role || !isHandRole(role) || str[0] !== str[0].toUpperCase() || !defined(to)) return
        return { role, to }
    }
    if (str.length === 4 || (str.length === 5 && str[4] === '+')) {
        const from = parseSquare(str.slice(0, 2))
        const to = parseSquare(str.slice(2, 4))
        if (!defined(from) || !defined(to)) return
        return { from, to, promotion: str.length === 5 }
    }
    return
}

export const makeUsi = (move: Move): string => {
    if (isDrop(move)) return `${roleToChar(move.role).toUpperCase()}*${makeSquare(move.to)}`
    return makeSquare(move.from) + makeSquare(move.to) + (move.promotion ? '+' : '')
}
