export * from './measurement';
export * from './size';
export * from './truncation-mask';
