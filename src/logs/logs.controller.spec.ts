import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { FakeDatabase } from '../../libs/common/src/testing';
import { createTestApp } from '../testing/test-app';
import { LogsController } from './logs.controller';
import { LogsService } from './logs.service';

const BASE = '/api/v1/warehouses/WH001/cameras/CAM1/logs';

describe('LogsController', () => {
  let app: INestApplication;
  let database: FakeDatabase;

  beforeEach(async () => {
    database = new FakeDatabase();
    app = await createTestApp({ controllers: [LogsController], providers: [LogsService], database });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('date validation', () => {
    it.each(['22-09-2025', '2025/09/22', '2025-02-30'])('rejects %s before touching the store', async (date) => {
      const response = await request(app.getHttpServer()).get(`${BASE}/employees`).query({ date });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        status: 'error',
        statusCode: 400,
        message: 'Invalid date format. Use YYYY-MM-DD',
        method: 'GET',
      });
      expect(database.connections).toBe(0);
    });

    it('requires a date', async () => {
      const response = await request(app.getHttpServer()).get(`${BASE}/vehicles`);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Query parameter date is required (YYYY-MM-DD)');
      expect(response.body.path).toBe(`${BASE}/vehicles`);
      expect(database.connections).toBe(0);
    });
  });

  describe('GET employees', () => {
    it('buckets the scoped rows by hour', async () => {
      database.onRows(/FROM public\.wh_emp_logs/, [
        {
          id: 11,
          warehouse_id: 'WH001',
          emp_id: 'EMP1',
          emp_name: 'Asha',
          emp_number: '100',
          role_name: 'Supervisor',
          date: '2025-09-22',
          time: '2025-09-22 08:15:00',
          cam_id: 'CAM1',
          crop_blob_url: 'https://example.invalid/crops/11.jpg',
          chunk_id: 'chunk-1',
          emp_access: 'authorized',
        },
      ]);

      const response = await request(app.getHttpServer()).get(`${BASE}/employees`).query({ date: '2025-09-22' });

      expect(response.status).toBe(200);
      expect(database.statements).toHaveLength(1);
      expect(database.statements[0].values).toEqual(['WH001', 'CAM1', '2025-09-22']);
      expect(response.body).toEqual({
        status: 'success',
        warehouse_id: 'WH001',
        cam_id: 'CAM1',
        date: '2025-09-22',
        total_logs: 1,
        unique_employees: 1,
        logs_without_time: 0,
        hourly_ranges: [
          {
            hour_range: '08:00 - 08:59',
            start_time: '08:00',
            end_time: '08:59',
            total_logs: 1,
            unique_employees: 1,
            logs: [
              {
                log_id: 11,
                warehouse_id: 'WH001',
                emp_id: 'EMP1',
                emp_name: 'Asha',
                emp_number: '100',
                role_name: 'Supervisor',
                date: '2025-09-22',
                time: '2025-09-22 08:15:00',
                cam_id: 'CAM1',
                crop_blob_url: 'https://example.invalid/crops/11.jpg',
                chunk_id: 'chunk-1',
                emp_access: 'authorized',
              },
            ],
          },
        ],
      });
    });

    it('answers an empty day with the zero shape', async () => {
      const response = await request(app.getHttpServer()).get(`${BASE}/employees`).query({ date: '2025-09-22' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'success',
        message: 'No employee logs found for the given criteria',
        warehouse_id: 'WH001',
        cam_id: 'CAM1',
        date: '2025-09-22',
        total_logs: 0,
        unique_employees: 0,
        logs_without_time: 0,
        hourly_ranges: [],
      });
    });
  });

  describe('GET gunny-bags', () => {
    it('summarizes bags per action', async () => {
      database.onRows(/FROM public\.wh_gunny_logs/, [
        { id: 1, warehouse_id: 'WH001', cam_id: 'CAM1', count: 10, date: '2025-09-22', chunk_id: 'c1', created_at: '2025-09-22 10:00:00', action: 'loading' },
        { id: 2, warehouse_id: 'WH001', cam_id: 'CAM1', count: 6, date: '2025-09-22', chunk_id: 'c1', created_at: '2025-09-22 10:05:00', action: 'loading' },
      ]);

      const response = await request(app.getHttpServer()).get(`${BASE}/gunny-bags`).query({ date: '2025-09-22' });

      expect(response.status).toBe(200);
      expect(response.body.total_logs).toBe(2);
      expect(response.body.total_bags).toBe(16);
      expect(response.body.action_summary).toEqual({ loading: { count: 2, total_bags: 16 } });
      expect(response.body.logs[1].created_at).toBe('10:05:00');
      expect(response.body).not.toHaveProperty('message');
    });

    it('answers an empty day with the zero shape', async () => {
      const response = await request(app.getHttpServer()).get(`${BASE}/gunny-bags`).query({ date: '2025-09-22' });

      expect(response.body).toEqual({
        status: 'success',
        message: 'No gunny bag logs found for the given criteria',
        warehouse_id: 'WH001',
        cam_id: 'CAM1',
        date: '2025-09-22',
        total_logs: 0,
        total_bags: 0,
        action_summary: {},
        logs: [],
      });
    });
  });

  describe('GET vehicles', () => {
    it('answers an empty day with the zero shape', async () => {
      const response = await request(app.getHttpServer()).get(`${BASE}/vehicles`).query({ date: '2025-09-22' });

      expect(response.body).toEqual({
        status: 'success',
        message: 'No vehicle logs found for the given criteria',
        warehouse_id: 'WH001',
        cam_id: 'CAM1',
        date: '2025-09-22',
        total_logs: 0,
        unique_vehicles: 0,
        access_summary: {},
        logs: [],
      });
    });

    it('reports a store failure as a 500', async () => {
      database.onRows(/FROM public\.wh_vehicle_logs/, () => {
        throw new Error('connection refused');
      });

      const response = await request(app.getHttpServer()).get(`${BASE}/vehicles`).query({ date: '2025-09-22' });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('Database error: connection refused');
    });
  });
});
