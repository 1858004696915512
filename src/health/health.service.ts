import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type HealthPayload = {
  status: string;
  message: string;
  service: string;
  version: string;
  timestamp: string;
  endpoints: Record<string, string>;
};

@Injectable()
export class HealthService {
  constructor(private readonly configService: ConfigService) {}

  getHealth(): HealthPayload {
    const api = `/${this.configService.get<string>('apiPrefix', 'api/v1').replace(/^\/+|\/+$/g, '')}`;
    const scoped = `${api}/warehouses/{warehouse_id}/cameras/{cam_id}`;

    return {
      status: 'healthy',
      message: 'Warehouse API is running',
      service: 'warehouse-surveillance-api',
      version: '1.0.0',
      timestamp: new Date().toISOString(),
      endpoints: {
        warehouses: `GET ${api}/warehouses - Get all warehouses with employees`,
        warehouse_by_id: `GET ${api}/warehouses/{warehouse_id} - Get specific warehouse details`,
        camera_stream: `GET ${api}/cameras/stream-url - Get HLS streaming URL for camera`,
        chunks: `GET ${scoped}/chunks - Get video chunks`,
        employee_logs: `GET ${scoped}/logs/employees - Get employee logs`,
        gunny_logs: `GET ${scoped}/logs/gunny-bags - Get gunny bag logs`,
        vehicle_logs: `GET ${scoped}/logs/vehicles - Get vehicle logs`,
        dashboard: `GET ${api}/warehouses/{warehouse_id}/dashboard - Get dashboard analytics`,
        vehicle_gunny_analytics: `GET ${scoped}/analytics/vehicle-gunny-count - Get vehicle-wise gunny count`,
        chunk_chat: `POST ${scoped}/chunks/{chunk_id}/chat - Chat with AI about video chunk`,
      },
    };
  }
}
