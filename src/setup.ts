import { Board, boardEquals } from './board'
import { Hand } from './hand'
import { ByColor, Color, Move, isDrop } from './types'

/**
 * A not necessarily legal shogi position
 */
export interface Setup {
    board: Board;
    hands: ByColor<Hand>;
    turn: Color;
    ply: number;
    lastMove: Move | undefined;
}


export const defaultSetup = (): Setup => ({
    board: Board.default(),
    hands: { black: Hand.empty(), white: Hand.empty() },
    turn: 'black',
    ply: 1,
    lastMove: undefined
})


export const setupClone = (setup: Setup): Setup => ({
    board: setup.board.clone(),
    hands: { black: setup.hands.black.clone(), white: setup.hands.white.clone() },
    turn: setup.turn,
    ply: setup.ply,
    lastMove: setup.lastMove && { ...setup.lastMove }
})


export const moveEquals = (left: Move, right: Move): boolean => {
    if (isDrop(left)) return isDrop(right) && left.role === right.role && left.to === right.to
    return !isDrop(right) && left.from === right.from && left.to === right.to && left.promotion === right.promotion
}


export const setupEquals = (left: Setup, right: Setup): boolean =>
    boardEquals(left.board, right.board)
    && left.hands.black.equals(right.hands.black)
    && left.hands.white.equals(right.hands.white)
    && left.turn === right.turn
    && left.ply === right.ply
    && (left.lastMove && right.lastMove ? moveEquals(left.lastMove, right.lastMove) : left.lastMove === right.lastMove)
