export * from './users'
export * from './emails'
export * from './sms'
export * from './backends'
export * from './app'
export * from './routes'
