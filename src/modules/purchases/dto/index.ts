export * from './create-purchase.dto';
export * from './list-purchases-query.dto';
export * from './purchase.dto';
