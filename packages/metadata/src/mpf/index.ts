export * from './tags'
