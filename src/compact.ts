import { Result } from '@badrap/result'
import { Move, isDrop } from './types'
import { idToRole, isHandRole, isSquare, roleToId } from './util'

/**
 * 16 bit move encoding.
 *
 * Normal move: bit 15 promotion, bits 8..14 origin, bits 0..7 destination.
 * Drop: bits 8..15 piece kind id, bit 7 set, bits 0..6 destination.
 *
 * No valid move encodes to 0, which stands for "no move".
 */
export type CompactMove = number

export const NO_MOVE: CompactMove = 0

const PROMOTION_BIT = 0x8000
const DROP_BIT = 0x80

export enum InvalidMove {
    None = 'ERR_NONE',
    Range = 'ERR_RANGE',
    Square = 'ERR_SQUARE',
    Role = 'ERR_ROLE',
}

export class MoveCodecError extends Error {}


export const encodeMove = (move: Move): Result<CompactMove, MoveCodecError> => {
    if (!isSquare(move.to)) return Result.err(new MoveCodecError(InvalidMove.Square))
    if (isDrop(move)) {
        if (!isHandRole(move.role)) return Result.err(new MoveCodecError(InvalidMove.Role))
        return Result.ok((roleToId(move.role) << 8) | DROP_BIT | move.to)
    }
    if (!isSquare(move.from) || move.from === move.to) return Result.err(new MoveCodecError(InvalidMove.Square))
    return Result.ok((move.promotion ? PROMOTION_BIT : 0) | (move.from << 8) | move.to)
}


export const decodeMove = (value: CompactMove): Result<Move, MoveCodecError> => {
    if (value === NO_MOVE) return Result.err(new MoveCodecError(InvalidMove.None))
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) return Result.err(new MoveCodecError(InvalidMove.Range))

    if (value & DROP_BIT) {
        const role = idToRole(value >> 8)
        const to = value & 0x7f
        // only kinds that can be held in hand are dropped
        if (!role || !isHandRole(role)) return Result.err(new MoveCodecError(InvalidMove.Role))
        if (!isSquare(to)) return Result.err(new MoveCodecError(InvalidMove.Square))
        return Result.ok({ role, to })
    }

    const from = (value >> 8) & 0x7f
    const to = value & 0xff
    if (!isSquare(from) || !isSquare(to) || from === to) return Result.err(new MoveCodecError(InvalidMove.Square))
    return Result.ok({ from, to, promotion: (value & PROMOTION_BIT) !== 0 })
}
