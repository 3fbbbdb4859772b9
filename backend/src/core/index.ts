export { config } from './config';
export type { AppConfig } from './config';
export { getServices } from './services';
export type { Services } from './services';
