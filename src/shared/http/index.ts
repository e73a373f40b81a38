export * from './json-body'
