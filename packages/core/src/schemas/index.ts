export * from './document-schemas';
