export const FILE_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8', '9'] as const
export const RANK_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i'] as const

export type FileName = (typeof FILE_NAMES)[number]
export type RankName = (typeof RANK_NAMES)[number]


/**
 * 0..80, `(file - 1) * 9 + (rank - 1)`
 */
export type Square = number

export type SquareName = `${FileName}${RankName}`


export type BySquare<T> = T[]

export const COLORS = ['black', 'white'] as const

export type Color = (typeof COLORS)[number]


export type ByColor<T> = {
    [color in Color]: T
}


export const ROLES = [
    'pawn',
    'lance',
    'knight',
    'silver',
    'gold',
    'bishop',
    'rook',
    'king',
    'tokin',
    'promotedlance',
    'promotedknight',
    'promotedsilver',
    'horse',
    'dragon',
] as const


export type Role = (typeof ROLES)[number]


export type ByRole<T> = {
    [role in Role]: T
}


// sfen order
export const HAND_ROLES = ['rook', 'bishop', 'gold', 'silver', 'knight', 'lance', 'pawn'] as const

export type HandRole = (typeof HAND_ROLES)[number]


export type ByHandRole<T> = {
    [role in HandRole]: T
}


export interface Piece {
    role: Role;
    color: Color;
}


export interface NormalMove {
    from: Square;
    to: Square;
    promotion: boolean;
}


export interface DropMove {
    role: HandRole;
    to: Square;
}


export type Move = NormalMove | DropMove


export const isDrop = (move: Move): move is DropMove => 'role' in move

export const isNormal = (move: Move): move is NormalMove => 'from' in move
