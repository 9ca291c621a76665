import { expect, it } from 'vitest'
import { SquareSet, parseSquare } from '../src'

const squares = (set: SquareSet): number[] => Array.from(set)

it('holds single squares across the three words', () => {
    for (const square of [0, 26, 27, 53, 54, 80]) {
        const set = SquareSet.fromSquare(square)
        expect(set.size()).toBe(1)
        expect(set.has(square)).toBe(true)
        expect(set.first()).toBe(square)
        expect(set.last()).toBe(square)
        expect(set.singleSquare()).toBe(square)
    }
})

it('builds files and ranks', () => {
    expect(squares(SquareSet.fromFile(1))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8])
    expect(squares(SquareSet.fromFile(9))).toEqual([72, 73, 74, 75, 76, 77, 78, 79, 80])
    expect(squares(SquareSet.fromRank(1))).toEqual([0, 9, 18, 27, 36, 45, 54, 63, 72])
    expect(squares(SquareSet.fromRank(9))).toEqual([8, 17, 26, 35, 44, 53, 62, 71, 80])
    expect(SquareSet.fromFile(5).intersect(SquareSet.fromRank(5)).singleSquare()).toBe(parseSquare('5e'))
})

it('covers the board and nothing more', () => {
    expect(SquareSet.full().size()).toBe(81)
    expect(SquareSet.empty().complement().equals(SquareSet.full())).toBe(true)
    expect(SquareSet.full().complement().isEmpty()).toBe(true)
})

it('combines sets', () => {
    const a = SquareSet.fromSquare(3).with(40).with(77)
    const b = SquareSet.fromSquare(40).with(50)

    expect(squares(a.union(b))).toEqual([3, 40, 50, 77])
    expect(squares(a.intersect(b))).toEqual([40])
    expect(squares(a.diff(b))).toEqual([3, 77])
    expect(squares(a.xor(b))).toEqual([3, 50, 77])
    expect(a.intersects(b)).toBe(true)
    expect(a.isDisjoint(SquareSet.fromSquare(4))).toBe(true)
    expect(a.supersetOf(SquareSet.fromSquare(77))).toBe(true)
    expect(SquareSet.fromSquare(77).subsetOf(a)).toBe(true)
    expect(a.toggle(3).has(3)).toBe(false)
    expect(a.set(3, false).equals(a.without(3))).toBe(true)
})

it('iterates in both orders', () => {
    const set = SquareSet.fromSquare(80).with(0).with(30)
    expect(squares(set)).toEqual([0, 30, 80])
    expect(Array.from(set.reversed())).toEqual([80, 30, 0])
    expect(set.moreThanOne()).toBe(true)
    expect(set.singleSquare()).toBe(undefined)
    expect(SquareSet.empty().first()).toBe(undefined)
})
