import { Result } from '@badrap/result';
import { Board } from './board';
import { Hand } from './hand';
import { Setup } from './setup';
import { ByColor, COLORS, Color, HAND_ROLES, Piece } from './types';
import { charToRole, defined, isHandRole, promote, roleToChar, squareFromCoords, unpromote } from './util';

export const INITIAL_BOARD_SFEN = 'lnsgkgsnl/1r5b1/ppppppppp/9/9/9/PPPPPPPPP/1B5R1/LNSGKGSNL';
export const INITIAL_SFEN = INITIAL_BOARD_SFEN + ' b - 1';
export const EMPTY_BOARD_SFEN = '9/9/9/9/9/9/9/9/9';
export const EMPTY_SFEN = EMPTY_BOARD_SFEN + ' b - 1';

export enum InvalidSfen {
  Sfen = 'ERR_SFEN',
  Board = 'ERR_BOARD',
  Hands = 'ERR_HANDS',
  Turn = 'ERR_TURN',
  Ply = 'ERR_PLY',
}

export class SfenError extends Error {}

const parseSmallUint = (str: string): number | undefined => (/^\d{1,5}$/.test(str) ? parseInt(str, 10) : undefined);

const charToPiece = (ch: string, promoted: boolean): Piece | undefined => {
  const base = charToRole(ch);
  if (!base) return;
  const role = promoted ? promote(base) : base;
  return role && { role, color: ch.toUpperCase() === ch ? 'black' : 'white' };
};

export const parseBoardSfen = (boardPart: string): Result<Board, SfenError> => {
  const board = Board.empty();
  let rank = 1;
  let file = 9;
  for (let i = 0; i < boardPart.length; i++) {
    const c = boardPart[i];
    if (c === '/' && file === 0) {
      file = 9;
      rank++;
    } else {
      const step = parseInt(c, 10);
      if (step > 0) file -= step;
      else {
        const promoted = c === '+';
        const piece = charToPiece(promoted ? boardPart.charAt(++i) : c, promoted);
        const square = squareFromCoords(file, rank);
        if (!piece || !defined(square)) return Result.err(new SfenError(InvalidSfen.Board));
        board.set(square, piece);
        file--;
      }
    }
    if (file < 0) return Result.err(new SfenError(InvalidSfen.Board));
  }
  if (rank !== 9 || file !== 0) return Result.err(new SfenError(InvalidSfen.Board));
  return Result.ok(board);
};

export const parseHandsSfen = (handsPart: string): Result<ByColor<Hand>, SfenError> => {
  const hands = { black: Hand.empty(), white: Hand.empty() };
  if (handsPart === '-') return Result.ok(hands);
  const re = /(\d*)([A-Za-z])/y;
  let match: RegExpExecArray | null;
  while ((match = re.exec(handsPart))) {
    const role = charToRole(match[2]);
    const count = match[1] ? parseSmallUint(match[1]) : 1;
    if (!role || !isHandRole(role) || !defined(count) || count < 1) return Result.err(new SfenError(InvalidSfen.Hands));
    const hand = hands[match[2].toUpperCase() === match[2] ? 'black' : 'white'];
    if (!hand.set(role, hand.get(role) + count)) return Result.err(new SfenError(InvalidSfen.Hands));
    if (re.lastIndex === handsPart.length) return Result.ok(hands);
  }
  return Result.err(new SfenError(InvalidSfen.Hands));
};

export const parseSfen = (sfen: string): Result<Setup, SfenError> => {
  const parts = sfen.trim().split(/[\s_]+/);
  if (parts[0] === 'sfen') parts.shift();

  // Board
  const boardPart = parts.shift();
  if (!defined(boardPart)) return Result.err(new SfenError(InvalidSfen.Sfen));
  const board = parseBoardSfen(boardPart);

  // Turn
  let turn: Color;
  const turnPart = parts.shift();
  if (!defined(turnPart) || turnPart === 'b') turn = 'black';
  else if (turnPart === 'w') turn = 'white';
  else return Result.err(new SfenError(InvalidSfen.Turn));

  return board.chain(board => {
    // Hands
    const handsPart = parts.shift();
    const hands = defined(handsPart) ? parseHandsSfen(handsPart) : parseHandsSfen('-');

    // Ply
    const plyPart = parts.shift();
    const ply = defined(plyPart) ? parseSmallUint(plyPart) : 1;
    if (!defined(ply) || ply < 1) return Result.err(new SfenError(InvalidSfen.Ply));

    if (parts.length > 0) return Result.err(new SfenError(InvalidSfen.Sfen));

    return hands.map(hands => ({
      board,
      hands,
      turn,
      ply,
      lastMove: undefined,
    }));
  });
};

export const parsePiece = (str: string): Piece | undefined => {
  if (!str) return;
  const promoted = str[0] === '+';
  if (str.length !== (promoted ? 2 : 1)) return;
  return charToPiece(str[str.length - 1], promoted);
};

export const makePiece = (piece: Piece): string => {
  const base = unpromote(piece.role) ?? piece.role;
  let r = isHandRole(base) ? roleToChar(base) : roleToChar('king');
  if (piece.color === 'black') r = r.toUpperCase();
  return base === piece.role ? r : '+' + r;
};

export const makeBoardSfen = (board: Board): string => {
  let sfen = '';
  let empty = 0;
  for (let rank = 1; rank <= 9; rank++) {
    for (let file = 9; file >= 1; file--) {
      const square = (file - 1) * 9 + rank - 1;
      const piece = board.get(square);
      if (!piece) empty++;
      else {
        if (empty > 0) {
          sfen += empty;
          empty = 0;
        }
        sfen += makePiece(piece);
      }

      if (file === 1) {
        if (empty > 0) {
          sfen += empty;
          empty = 0;
        }
        if (rank !== 9) sfen += '/';
      }
    }
  }
  return sfen;
};

export const makeHandsSfen = (hands: ByColor<Hand>): string => {
  let sfen = '';
  for (const color of COLORS) {
    for (const role of HAND_ROLES) {
      const count = hands[color].get(role);
      if (count === 0) continue;
      const ch = roleToChar(role);
      sfen += (count > 1 ? count : '') + (color === 'black' ? ch.toUpperCase() : ch);
    }
  }
  return sfen || '-';
};

export const makeSfen = (setup: Setup): string =>
  [
    makeBoardSfen(setup.board),
    setup.turn === 'black' ? 'b' : 'w',
    makeHandsSfen(setup.hands),
    setup.ply,
  ].join(' ');
