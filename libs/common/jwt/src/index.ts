export * from './jwt.types';
export * from './token.service';
export * from './jwt.module';
