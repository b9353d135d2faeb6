export * as D from 'io-ts/lib/Decoder'
export * as E from 'fp-ts/lib/Either'
export * as O from 'fp-ts/lib/Option'
