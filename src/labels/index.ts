export * from './label-generator';
