export { default as environmentConfig } from './environment'
export * from './environment'
export * from './validation'
