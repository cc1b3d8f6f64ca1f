export * from './error-codes';
export * from './decrypto-error';
export * from './errors-factory';
export * from './decrypto-error.filter';
