export * from './web-filter';
export * from './web-filter-order';
export * from './web-filter.registry';
export * from './web-filter-chain.middleware';
export * from './filters';
