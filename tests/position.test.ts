import { expect, it } from 'vitest'
import { INITIAL_SFEN, IllegalSetup, Position, SquareSet, makeSfen, makeSquare, parseSfen, parseSquare } from '../src'

const names = (set: SquareSet): string[] => Array.from(set, makeSquare).sort()

const setup = (sfen: string) => parseSfen(sfen).unwrap()

const position = (sfen: string): Position => Position.fromSetup(setup(sfen)).unwrap()

const error = (sfen: string): string | undefined => {
    const pos = Position.fromSetup(setup(sfen))
    return pos.isErr ? pos.error.message : undefined
}

it('starts from the initial position', () => {
    const pos = Position.default()
    expect(pos.turn).toBe('black')
    expect(pos.ply).toBe(1)
    expect(pos.lastMove).toBe(undefined)
    expect(pos.kingOf('white')).toBe(parseSquare('5a'))
    expect(makeSfen(pos.toSetup())).toBe(INITIAL_SFEN)
})

it('rejects a second king', () => {
    expect(error('4k4/9/9/9/9/9/9/9/3KK4 b - 1')).toBe(IllegalSetup.Kings)
})

it('accepts a missing king', () => {
    expect(error('9/9/9/9/9/9/9/9/4K4 b - 1')).toBe(undefined)
})

it('rejects pieces that could never move', () => {
    expect(error('P3k4/9/9/9/9/9/9/9/4K4 b - 1')).toBe(IllegalSetup.DeadPiece)
    expect(error('4k4/9/9/9/9/9/9/9/n3K4 b - 1')).toBe(IllegalSetup.DeadPiece)
    expect(error('4k4/9/9/9/9/9/9/n8/4K4 b - 1')).toBe(IllegalSetup.DeadPiece)
    expect(error('4k4/L8/9/9/9/9/9/9/4K4 b - 1')).toBe(undefined)
})

it('rejects more pieces than a set holds', () => {
    expect(error('4k4/9/9/9/9/9/9/9/4K4 b 19P 1')).toBe(IllegalSetup.PieceCount)
    expect(error('4k4/9/9/9/9/9/9/9/4K4 b 3R 1')).toBe(IllegalSetup.PieceCount)
    expect(error('4k4/9/9/9/9/9/9/+R8/4K4 b Rr 1')).toBe(IllegalSetup.PieceCount)
    expect(error('4k4/9/9/9/9/9/9/+R8/4K4 b R 1')).toBe(undefined)
})

it('rejects a ply outside 1..65535', () => {
    const base = setup('4k4/9/9/9/9/9/9/9/4K4 b - 1')
    for (const ply of [0, 65536, 1.5]) {
        const pos = Position.fromSetup({ ...base, ply })
        expect(pos.isErr && pos.error.message).toBe(IllegalSetup.Ply)
    }
    expect(Position.fromSetup({ ...base, ply: 65535 }).isOk).toBe(true)
})

it('rejects a last move that does not encode', () => {
    const base = setup('4k4/9/9/9/9/9/9/9/4K4 b - 1')
    const pos = Position.fromSetup({ ...base, lastMove: { from: 3, to: 3, promotion: false } })
    expect(pos.isErr && pos.error.message).toBe(IllegalSetup.LastMove)
})

it('copies the setup it was built from', () => {
    const base = setup(INITIAL_SFEN)
    const pos = Position.fromSetup(base).unwrap()
    base.board.take(parseSquare('5i'))
    expect(pos.kingOf('black')).toBe(parseSquare('5i'))
    expect(pos.pieceAt(parseSquare('5i'))).toEqual({ role: 'king', color: 'black' })
})

it('lists destinations of the side to move', () => {
    const pos = Position.default()
    expect(names(pos.dests(parseSquare('7g')))).toEqual(['7f'])
    expect(names(pos.dests(parseSquare('8h')))).toEqual([])
    expect(names(pos.dests(parseSquare('3c')))).toEqual([])
    expect(names(pos.dests(parseSquare('5e')))).toEqual([])
})

it('keeps pinned pieces on the line', () => {
    const pos = position('4r4/9/9/9/9/9/9/4G4/4K4 b - 1')
    expect(names(pos.dests(parseSquare('5h')))).toEqual(['5g'])
})

it('keeps the king out of attack', () => {
    const pos = position('4r4/9/9/9/9/9/9/9/4K4 b - 1')
    expect(names(pos.dests(parseSquare('5i')))).toEqual(['4h', '4i', '6h', '6i'])
})

it('captures a checking piece', () => {
    const pos = position('4k4/9/9/9/9/9/9/4g4/4KG3 b - 1')
    expect(names(pos.dests(parseSquare('4i')))).toEqual(['5h'])
    expect(names(pos.dests(parseSquare('5i')))).toEqual(['5h'])
})

it('tells attacked squares', () => {
    const pos = Position.default()
    expect(pos.isAttacked(parseSquare('7f'), 'black')).toBe(true)
    expect(pos.isAttacked(parseSquare('7f'), 'white')).toBe(false)
    expect(pos.isAttacked(parseSquare('5d'), 'white')).toBe(true)
})

it('hands out copies of its parts', () => {
    const pos = position('4k4/9/9/9/9/9/9/4G4/4K4 b 2P 1')

    pos.board.take(parseSquare('5i'))
    expect(pos.kingOf('black')).toBe(parseSquare('5i'))
    expect(pos.pieceAt(parseSquare('5i'))).toEqual({ role: 'king', color: 'black' })

    pos.hand('black').set('pawn', 200)
    expect(pos.hand('black').get('pawn')).toBe(2)

    const lastMove = Position.fromSetup({ ...setup('4k4/9/9/9/9/9/9/9/4K4 b - 2'), lastMove: { from: 1, to: 2, promotion: false } }).unwrap()
    const move = lastMove.lastMove
    if (move && 'from' in move) move.to = 3
    expect(lastMove.lastMove).toEqual({ from: 1, to: 2, promotion: false })
})

it('reads occupancy by color and role', () => {
    const pos = Position.default()
    expect(pos.occupied().size()).toBe(40)
    expect(pos.occupied('white').size()).toBe(20)
    expect(names(pos.roleSquares('rook'))).toEqual(['2h', '8b'])
})
