export { DatabaseModule } from './database.module';
export { DatabaseService } from './database.service';
export type { SqlSession } from './database.service';
export * from './row-mapper';
