export * from './download-authorization-query.dto';
export * from './download-grant.dto';
