export * from './orders.controller'
