export * from './event.types';
export * from './event-window';
export * from './event-clock.service';
export * from './event-clock.module';
