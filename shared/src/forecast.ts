import type { Granularity } from './enums.js';

export interface ForecastPoint {
  period: string;
  start: string;
  predicted: number;   // non-negative integer
}

// Fitted line parameters, exposed for transparency
export interface ForecastModel {
  slope: number;
  intercept: number;
  rSquared: number;
  observations: number;
  historyStart: string;
  historyEnd: string;
}

export interface ForecastResult {
  granularity: Granularity;
  horizon: number;
  predictions: ForecastPoint[];
  predictedTotal: number;
  averagePerPeriod: number;
  model: ForecastModel;
}
