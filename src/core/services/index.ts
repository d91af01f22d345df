export * from './message.service';
