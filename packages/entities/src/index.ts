export { Customer, type CustomerJson, type CustomerProps } from './customer.js';
export { Purchase, type PurchaseProps } from './purchase.js';
