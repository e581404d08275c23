export * from './address.js';
export * from './currency-slot.js';
