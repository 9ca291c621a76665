import { expect, it } from 'vitest'
import { Board, boardEquals, isConsistent, parseSquare } from '../src'

it('sets up the initial placement', () => {
    const board = Board.default()
    expect(board.occupied.size()).toBe(40)
    expect(board.black.size()).toBe(20)
    expect(board.pieces('black', 'pawn').size()).toBe(9)
    expect(board.get(parseSquare('7g'))).toEqual({ role: 'pawn', color: 'black' })
    expect(board.get(parseSquare('8h'))).toEqual({ role: 'bishop', color: 'black' })
    expect(board.get(parseSquare('2h'))).toEqual({ role: 'rook', color: 'black' })
    expect(board.get(parseSquare('8b'))).toEqual({ role: 'rook', color: 'white' })
    expect(board.kingOf('black')).toBe(parseSquare('5i'))
    expect(board.kingOf('white')).toBe(parseSquare('5a'))
    expect(isConsistent(board)).toBe(true)
})

it('keeps the square array and the sets together', () => {
    const board = Board.default()
    const square = parseSquare('7g')

    expect(board.take(square)).toEqual({ role: 'pawn', color: 'black' })
    expect(board.has(square)).toBe(false)
    expect(board.getRole(square)).toBe(undefined)
    expect(isConsistent(board)).toBe(true)

    expect(board.set(parseSquare('3c'), { role: 'tokin', color: 'black' })).toEqual({ role: 'pawn', color: 'white' })
    expect(board.getColor(parseSquare('3c'))).toBe('black')
    expect(board.roles.pawn.has(parseSquare('3c'))).toBe(false)
    expect(board.roles.tokin.has(parseSquare('3c'))).toBe(true)
    expect(isConsistent(board)).toBe(true)
})

it('clones without sharing', () => {
    const board = Board.default()
    const copy = board.clone()
    expect(boardEquals(board, copy)).toBe(true)
    copy.take(parseSquare('5i'))
    expect(boardEquals(board, copy)).toBe(false)
    expect(board.kingOf('black')).toBe(parseSquare('5i'))
})

it('detects sets out of step with the squares', () => {
    const board = Board.empty()
    board.set(parseSquare('5e'), { role: 'gold', color: 'black' })
    board.white = board.white.with(parseSquare('5e'))
    expect(isConsistent(board)).toBe(false)
})
