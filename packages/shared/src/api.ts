export interface ErrorResponse {
  error: string;
}

export interface ServiceStatusResponse {
  ok: boolean;
  redis: boolean;
  pools: number;
  uptimeS: number;
}
