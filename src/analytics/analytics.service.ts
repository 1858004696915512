import { HttpException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { DatabaseService, errorMessage } from '../../libs/common';
import type { LogScope } from '../logs/logs.types';
import {
  ActionAggregateRow,
  collectPlateChunks,
  PlateSightingRow,
  resolveVehicleGunnyCounts,
  VehicleGunnyReport,
} from './vehicle-gunny.resolver';

const PLATE_SIGHTINGS_QUERY = `
  SELECT DISTINCT number_plate, chunk_id
  FROM public.wh_vehicle_logs
  WHERE warehouse_id = $1
    AND cam_id = $2
    AND date = $3
    AND number_plate IS NOT NULL
    AND chunk_id IS NOT NULL`;

const GUNNY_BY_CHUNKS_QUERY = `
  SELECT
    action,
    SUM(count) AS total_count,
    COUNT(*) AS entry_count,
    MIN(created_at) AS first_entry_time,
    MAX(created_at) AS last_entry_time
  FROM public.wh_gunny_logs
  WHERE warehouse_id = $1
    AND cam_id = $2
    AND date = $3
    AND chunk_id = ANY($4)
  GROUP BY action
  ORDER BY action`;

export type VehicleGunnyResponse = { status: 'success'; message?: string } & LogScope & VehicleGunnyReport;

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(private readonly database: DatabaseService) {}

  async getVehicleGunnyCount(scope: LogScope): Promise<VehicleGunnyResponse> {
    const { warehouse_id, cam_id, date } = scope;

    try {
      const report = await this.database.withConnection(async (session) => {
        const sightings = await session.rows<PlateSightingRow>(PLATE_SIGHTINGS_QUERY, [warehouse_id, cam_id, date]);
        return resolveVehicleGunnyCounts(collectPlateChunks(sightings), (chunkIds) =>
          session.rows<ActionAggregateRow>(GUNNY_BY_CHUNKS_QUERY, [warehouse_id, cam_id, date, chunkIds]),
        );
      });

      const shared = report.vehicles.filter((vehicle) => vehicle.shared_chunk_ids.length > 0);
      if (shared.length > 0) {
        this.logger.warn(
          `Plates ${shared.map((v) => v.number_plate).join(', ')} share chunks on ${warehouse_id}/${cam_id}/${date}; their bags are counted for each plate`,
        );
      }

      return {
        status: 'success',
        ...(report.total_vehicles === 0 ? { message: 'No vehicles found for the given criteria' } : {}),
        ...scope,
        ...report,
      };
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(`Error fetching vehicle-wise gunny count: ${errorMessage(error)}`);
      throw new InternalServerErrorException(`Database error: ${errorMessage(error)}`);
    }
  }
}
