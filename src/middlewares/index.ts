export * from './logging.middleware';
export * from './request-id.middleware';
