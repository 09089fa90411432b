export interface HealthResponse {
  status: 'ok' | 'starting';
  timestamp: string;
  uptime: number;
  service: string;
  positions: number;
}
