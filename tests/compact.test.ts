import { expect, it } from 'vitest'
import { HAND_ROLES, InvalidMove, Move, NO_MOVE, decodeMove, encodeMove, parseUsi } from '../src'

const usi = (str: string): Move => {
    const move = parseUsi(str)
    if (!move) throw new Error(`bad usi ${str}`)
    return move
}

const decodeError = (value: number): string | undefined => {
    const move = decodeMove(value)
    return move.isErr ? move.error.message : undefined
}

it('packs normal moves', () => {
    expect(encodeMove(usi('7g7f')).unwrap()).toBe((60 << 8) | 59)
    expect(encodeMove(usi('8h2b+')).unwrap()).toBe(0x8000 | (70 << 8) | 10)
    expect(decodeMove(0x8000 | (70 << 8) | 10).unwrap()).toEqual({ from: 70, to: 10, promotion: true })
})

it('packs drops', () => {
    expect(encodeMove(usi('P*5e')).unwrap()).toBe((1 << 8) | 0x80 | 40)
    expect(encodeMove({ role: 'rook', to: 0 }).unwrap()).toBe((7 << 8) | 0x80)
    expect(decodeMove((7 << 8) | 0x80).unwrap()).toEqual({ role: 'rook', to: 0 })
})

it('never encodes a move as zero', () => {
    const seen = new Set<number>()
    const moves: Move[] = []
    for (let to = 0; to < 81; to++) {
        for (const role of HAND_ROLES) moves.push({ role, to })
        for (let from = 0; from < 81; from++) {
            if (from === to) continue
            moves.push({ from, to, promotion: false }, { from, to, promotion: true })
        }
    }
    for (const move of moves) {
        const value = encodeMove(move).unwrap()
        expect(value).not.toBe(NO_MOVE)
        expect(decodeMove(value).unwrap()).toEqual(move)
        seen.add(value)
    }
    expect(seen.size).toBe(moves.length)
})

it('rejects moves that do not fit', () => {
    const error = (move: Move) => {
        const value = encodeMove(move)
        return value.isErr ? value.error.message : undefined
    }
    expect(error({ from: 10, to: 81, promotion: false })).toBe(InvalidMove.Square)
    expect(error({ from: 81, to: 10, promotion: false })).toBe(InvalidMove.Square)
    expect(error({ from: 10, to: 10, promotion: false })).toBe(InvalidMove.Square)
    expect(error({ role: 'pawn', to: -1 })).toBe(InvalidMove.Square)
})

it('rejects values that are not moves', () => {
    expect(decodeError(NO_MOVE)).toBe(InvalidMove.None)
    expect(decodeError(-1)).toBe(InvalidMove.Range)
    expect(decodeError(0x10000)).toBe(InvalidMove.Range)
    expect(decodeError(1.5)).toBe(InvalidMove.Range)
    expect(decodeError(0x80 | 5)).toBe(InvalidMove.Role)
    expect(decodeError((15 << 8) | 0x80 | 1)).toBe(InvalidMove.Role)
    expect(decodeError((8 << 8) | 0x80 | 5)).toBe(InvalidMove.Role)
    expect(decodeError((9 << 8) | 0x80 | 5)).toBe(InvalidMove.Role)
    expect(decodeError((14 << 8) | 0x80 | 5)).toBe(InvalidMove.Role)
    expect(decodeError((1 << 8) | 0x80 | 81)).toBe(InvalidMove.Square)
    expect(decodeError((1 << 8) | 1)).toBe(InvalidMove.Square)
    expect(decodeError(81)).toBe(InvalidMove.Square)
    expect(decodeError(90 << 8)).toBe(InvalidMove.Square)
})
