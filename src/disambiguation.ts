import { SquareSet } from './squareSet'
import { Color, Role, Square } from './types'
import { relativeRank, squareFile } from './util'

// pieces that move like a gold, and the silver, are told apart by 直 / 右 / 左
const GOLD_LIKE: Role[] = ['gold', 'silver', 'tokin', 'promotedlance', 'promotedknight', 'promotedsilver']


interface Narrowing {
    subset: SquareSet;
    mark: string;
}


/**
 * 上 (toward the opponent), 引 (back) or 寄 (sideways), with the candidates
 * that move the same way.
 */
const byMovement = (color: Color, from: Square, to: Square, candidates: SquareSet): Narrowing => {
    const way = (square: Square) => Math.sign(relativeRank(color, square) - relativeRank(color, to))
    const dir = way(from)
    let subset = SquareSet.empty()
    for (const c of candidates) {
        if (way(c) === dir) subset = subset.with(c)
    }
    return { subset, mark: dir > 0 ? '上' : dir < 0 ? '引' : '寄' }
}


/**
 * 直, 右 or 左, seen from the mover's side of the board.
 */
const byPosition = (color: Color, role: Role, from: Square, to: Square, candidates: SquareSet): Narrowing | undefined => {

    if (GOLD_LIKE.includes(role)) {
        const fileDiff = squareFile(from) - squareFile(to)
        if (fileDiff === 0 && relativeRank(color, from) > relativeRank(color, to)) {
            return { subset: SquareSet.fromSquare(from), mark: '直' }
        }
        const relative = color === 'black' ? fileDiff : -fileDiff
        if (relative === 0) return
        let subset = SquareSet.empty()
        for (const c of candidates) {
            if (squareFile(c) - squareFile(to) === fileDiff) subset = subset.with(c)
        }
        return { subset, mark: relative < 0 ? '右' : '左' }
    }

    // long range pieces come in pairs, compare the two
    if (candidates.size() !== 2) return
    const [a, b] = [...candidates]
    if (squareFile(a) === squareFile(b)) return
    const rightmost = (squareFile(a) < squareFile(b)) === (color === 'black') ? a : b
    return { subset: SquareSet.fromSquare(from), mark: from === rightmost ? '右' : '左' }
}


/**
 * The qualifier that singles out the piece on `from` among `candidates`, the
 * squares of like pieces that reach `to` (`from` included). Empty when there
 * is nothing to tell apart, undefined when the marks do not settle it.
 */
export const disambiguate = (
    color: Color,
    role: Role,
    from: Square,
    to: Square,
    candidates: SquareSet,
): string | undefined => {

    if (!candidates.moreThanOne()) return ''

    const vertical = byMovement(color, from, to, candidates)
    if (vertical.subset.size() === 1) return vertical.mark

    const horizontal = byPosition(color, role, from, to, candidates)
    if (!horizontal) return

    if (horizontal.subset.size() === 1) return horizontal.mark
    if (horizontal.subset.intersect(vertical.subset).size() === 1) return horizontal.mark + vertical.mark

    return
}
