export * from './api-key.middleware';
export * from './logging.middleware';
export * from './request-id.middleware';
