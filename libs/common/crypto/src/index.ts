export * from './password.service';
export * from './crypto.module';
