import { Module } from '@nestjs/common';
import { ConfigModule, DatabaseModule } from '../libs/common';
import { AnalyticsModule } from './analytics/analytics.module';
import { CamerasModule } from './cameras/cameras.module';
import { ChatModule } from './chat/chat.module';
import { ChunksModule } from './chunks/chunks.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { HealthModule } from './health/health.module';
import { LogsModule } from './logs/logs.module';
import { WarehousesModule } from './warehouses/warehouses.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    HealthModule,
    WarehousesModule,
    CamerasModule,
    ChunksModule,
    LogsModule,
    DashboardModule,
    AnalyticsModule,
    ChatModule,
  ],
})
export class AppModule {}
