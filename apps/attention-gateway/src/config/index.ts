export { loadConfig, type AppConfig, type SessionStoreDriver } from './env';
