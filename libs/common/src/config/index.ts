export { ConfigModule } from './config.module';
export { default as appConfig } from './app.config';
