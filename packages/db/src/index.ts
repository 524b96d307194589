export * from './memory'
export * from './rows'
export * from './supabase'
