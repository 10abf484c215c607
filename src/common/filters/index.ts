export * from './http-exception.filter';
