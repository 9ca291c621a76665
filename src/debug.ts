import { Board } from "./board";
import { Hand } from "./hand";
import { Position } from "./position";
import { makeHandsSfen, makePiece, makeSfen } from "./sfen";
import { SquareSet } from "./squareSet";
import { Piece, Square } from "./types";
import { makeSquare } from "./util";

/* files 9 to 1 across, ranks 1 to 9 down, as black sees the board */
const grid = (cell: (square: Square) => string, sep: string): string => {
  const r = [];
  for (let rank = 1; rank <= 9; rank++) {
    for (let file = 9; file >= 1; file--) {
      r.push(cell((file - 1) * 9 + rank - 1));
      r.push(file > 1 ? sep : '\n');
    }
  }
  return r.join('');
};

export const squareSet = (squares: SquareSet): string => grid(square => (squares.has(square) ? '1' : '.'), ' ');


export const piece = (piece: Piece): string => makePiece(piece)


export const board = (board: Board): string => grid(square => {
  const p = board.get(square);
  const col = p ? piece(p) : '.';
  return col.length < 2 ? ' ' + col : col;
}, '');

export const square = (sq: Square): string => makeSquare(sq);


export const hand = (hand: Hand): string => makeHandsSfen({ black: hand, white: Hand.empty() });


export const position = (pos: Position): string => board(pos.board) + makeSfen(pos.toSetup());
