export * from './types'
export * from './util'
export * from './squareSet'
export * from './attacks'
export * from './board'
export * from './hand'

export * from './setup'

export * from './position'

export * from './compact'
export * from './numerals'
export * from './kifu'


export * as compat from './compat'


export * as debug from './debug'
export * from './sfen'
