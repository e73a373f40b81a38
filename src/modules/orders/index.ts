export * from './orders.module'
