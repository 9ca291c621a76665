export const NUMERAL_STYLES = ['arabic', 'kansuji'] as const

/**
 * `arabic` writes both coordinates in full-width digits (７６), `kansuji`
 * writes the rank in kanji numerals (７六).
 */
export type NumeralStyle = (typeof NUMERAL_STYLES)[number]

export type Alphabet = 'fullwidth' | 'kansuji'

const FULLWIDTH = ['１', '２', '３', '４', '５', '６', '７', '８', '９'] as const
const KANSUJI = ['一', '二', '三', '四', '五', '六', '七', '八', '九'] as const


export const renderDigit = (digit: number, alphabet: Alphabet): string => {
    if (!Number.isInteger(digit) || digit < 1 || digit > 9) throw new RangeError(`digit out of range: ${digit}`)
    return (alphabet === 'kansuji' ? KANSUJI : FULLWIDTH)[digit - 1]
}

/** files are always full-width digits */
export const renderFile = (file: number): string => renderDigit(file, 'fullwidth')

export const renderRank = (rank: number, style: NumeralStyle): string =>
    renderDigit(rank, style === 'kansuji' ? 'kansuji' : 'fullwidth')
