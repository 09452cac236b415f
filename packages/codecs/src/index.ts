export * from './koi'
