import { ByHandRole, HAND_ROLES, HandRole, Role } from './types'
import { isHandRole } from './util'

/** a hand count is stored in one byte */
export const MAX_HAND_COUNT = 255


/**
 * Pieces in hand of one player, counted per unpromoted kind.
 */
export class Hand implements Iterable<[HandRole, number]> {

    private constructor(private readonly counts: ByHandRole<number>) {}

    static empty(): Hand {
        return new Hand({ rook: 0, bishop: 0, gold: 0, silver: 0, knight: 0, lance: 0, pawn: 0 })
    }

    clone(): Hand {
        return new Hand({ ...this.counts })
    }

    get(role: Role): number {
        return isHandRole(role) ? this.counts[role] : 0
    }

    /**
     * Returns false and leaves the hand as it is when `count` does not fit a
     * byte.
     */
    set(role: HandRole, count: number): boolean {
        if (!Number.isInteger(count) || count < 0 || count > MAX_HAND_COUNT) return false
        this.counts[role] = count
        return true
    }

    add(role: HandRole): boolean {
        return this.set(role, this.counts[role] + 1)
    }

    remove(role: HandRole): boolean {
        return this.set(role, this.counts[role] - 1)
    }

    size(): number {
        return HAND_ROLES.reduce((acc, role) => acc + this.counts[role], 0)
    }

    isEmpty(): boolean {
        return this.size() === 0
    }

    equals(other: Hand): boolean {
        return HAND_ROLES.every(role => this.counts[role] === other.counts[role])
    }

    *[Symbol.iterator](): Iterator<[HandRole, number]> {
        for (const role of HAND_ROLES) {
            if (this.counts[role] > 0) yield [role, this.counts[role]]
        }
    }
}
