export * from './Accounts'
export * from './Database'
export * from './Gallery'
export * from './Storage'
