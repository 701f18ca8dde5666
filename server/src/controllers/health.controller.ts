/**
 * Service metadata & health endpoints
 *
 * - GET /       : static service metadata
 * - GET /health : liveness + whether the Places credential is present.
 *                 Never fails and never calls the provider.
 */

import type { Request, Response } from 'express';
import type { HealthResponse, ServiceInfoResponse } from '@api';

export const SERVICE_NAME = 'Restaurant Search API';
export const SERVICE_VERSION = '1.0.0';

export function rootHandler(_req: Request, res: Response): void {
  const body: ServiceInfoResponse = {
    message: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'running'
  };
  res.status(200).json(body);
}

export function createHealthHandler(isConfigured: () => boolean) {
  return function healthHandler(_req: Request, res: Response): void {
    const body: HealthResponse = {
      status: 'healthy',
      google_maps_configured: isConfigured()
    };
    res.status(200).json(body);
  };
}
