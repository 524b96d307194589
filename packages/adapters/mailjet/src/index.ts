export * from './client'
export * from './email'
export * from './sms'
