export * from './config.types';
export * from './config.module';
export { buildConfiguration } from './configuration';
