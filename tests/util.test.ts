import { expect, it } from 'vitest'
import { Move, isDrop, isNormal, makeUsi, parseSquare, parseUsi } from '../src'

it('reads and writes usi moves', () => {
    for (const str of ['7g7f', '8h2b+', 'P*5e', 'R*1a', 'L*9i']) {
        const move = parseUsi(str)
        expect(move && makeUsi(move)).toBe(str)
    }
})

it('tells normal moves from drops', () => {
    const normal: Move = { from: parseSquare('7g'), to: parseSquare('7f'), promotion: false }
    const drop: Move = { role: 'gold', to: parseSquare('5e') }
    expect(isNormal(normal)).toBe(true)
    expect(isDrop(normal)).toBe(false)
    expect(isNormal(drop)).toBe(false)
    expect(isDrop(drop)).toBe(true)
})

it('rejects drops of pieces that are never held', () => {
    expect(parseUsi('K*5e')).toBe(undefined)
    expect(parseUsi('p*5e')).toBe(undefined)
    expect(parseUsi('7g7f=')).toBe(undefined)
    expect(parseUsi('0a1a')).toBe(undefined)
})
