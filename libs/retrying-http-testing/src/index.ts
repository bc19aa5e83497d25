export * from './testServer';
