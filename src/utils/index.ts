export * from './errors'
export * from './flash'
export * from './Logger'
export * from './qrCode'
export * from './render'
export * from './secureFilename'
export * from './toObjectId'
