import { Injectable } from '@nestjs/common';

export type HealthStatus = {
  status: 'ok';
  timestamp: string;
  uptime: number;
};

@Injectable()
export class HealthService {
  private readonly startTime = Date.now();

  getHealth(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
    };
  }
}
