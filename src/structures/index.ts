export * from './Route'
export * from './Server'
export * from './Task'
