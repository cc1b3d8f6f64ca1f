export * from './database.service';
export * from './database.module';
export * from './with-deadline';
