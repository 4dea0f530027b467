// This module fits an additive trend-plus-seasonality model by least squares and produces banded predictions.

import { Matrix, SingularValueDecomposition } from 'ml-matrix';
import { DAY_MS } from './time.js';

// Two-sided 80% normal interval.
export const INTERVAL_Z = 1.2815515655446004;

export interface Observation {
  timestamp: number;
  value: number;
}

export interface Seasonality {
  name: 'yearly' | 'weekly' | 'daily';
  periodDays: number;
  order: number;
}

export interface Prediction {
  timestamp: number;
  yhat: number;
  lower: number;
  upper: number;
}

const YEARLY: Seasonality = { name: 'yearly', periodDays: 365.25, order: 10 };
const WEEKLY: Seasonality = { name: 'weekly', periodDays: 7, order: 3 };
const DAILY: Seasonality = { name: 'daily', periodDays: 1, order: 4 };

// This function enables seasonal components the history can support, keeping the design matrix no wider than the sample.
export function selectSeasonalities(spanMs: number, cadenceMs: number, observationCount: number): Seasonality[] {
  const candidates: Seasonality[] = [];
  if (spanMs >= 730 * DAY_MS) {
    candidates.push(YEARLY);
  }
  if (spanMs >= 14 * DAY_MS && cadenceMs < 7 * DAY_MS) {
    candidates.push(WEEKLY);
  }
  if (cadenceMs < DAY_MS && spanMs >= 2 * DAY_MS) {
    candidates.push(DAILY);
  }

  const selected: Seasonality[] = [];
  let width = 2;
  for (const seasonality of candidates) {
    if (width + 2 * seasonality.order > observationCount) {
      continue;
    }
    selected.push(seasonality);
    width += 2 * seasonality.order;
  }

  return selected;
}

// Called between row chunks; may reject to stop the fit.
export type FitCheckpoint = () => Promise<void>;

export const FIT_CHUNK_ROWS = 2048;

const noCheckpoint: FitCheckpoint = async () => undefined;

export class AdditiveModel {
  public readonly seasonalities: Seasonality[];
  public readonly sigma: number;
  private readonly origin: number;
  private readonly span: number;
  private readonly coefficients: number[];
  private readonly historyCount: number;

  private constructor(
    origin: number,
    span: number,
    seasonalities: Seasonality[],
    coefficients: number[],
    sigma: number,
    historyCount: number
  ) {
    this.origin = origin;
    this.span = span;
    this.seasonalities = seasonalities;
    this.coefficients = coefficients;
    this.sigma = sigma;
    this.historyCount = historyCount;
  }

  // This factory fits the model on chronologically sorted, distinct-timestamp observations.
  // Rows are folded into the normal equations chunk by chunk, awaiting the checkpoint in between.
  public static async fit(
    history: Observation[],
    cadenceMs: number,
    checkpoint: FitCheckpoint = noCheckpoint
  ): Promise<AdditiveModel> {
    if (history.length < 2) {
      throw new Error('At least 2 distinct timestamps are required to fit a forecast model.');
    }

    const origin = history[0].timestamp;
    const span = history[history.length - 1].timestamp - origin;
    if (span <= 0) {
      throw new Error('History must span more than one timestamp.');
    }

    const seasonalities = selectSeasonalities(span, cadenceMs, history.length);
    const width = 2 + seasonalities.reduce((total, seasonality) => total + 2 * seasonality.order, 0);
    const gram = Array.from({ length: width }, () => new Array<number>(width).fill(0));
    const moment = new Array<number>(width).fill(0);

    for (let index = 0; index < history.length; index += 1) {
      if (index > 0 && index % FIT_CHUNK_ROWS === 0) {
        await checkpoint();
      }

      const { timestamp, value } = history[index];
      const row = AdditiveModel.features(timestamp, origin, span, seasonalities);
      for (let i = 0; i < width; i += 1) {
        moment[i] += row[i] * value;
        for (let j = i; j < width; j += 1) {
          gram[i][j] += row[i] * row[j];
        }
      }
    }

    for (let i = 0; i < width; i += 1) {
      for (let j = 0; j < i; j += 1) {
        gram[i][j] = gram[j][i];
      }
    }

    await checkpoint();
    const coefficients = new SingularValueDecomposition(new Matrix(gram))
      .solve(Matrix.columnVector(moment))
      .to1DArray();

    let squaredError = 0;
    for (let index = 0; index < history.length; index += 1) {
      if (index > 0 && index % FIT_CHUNK_ROWS === 0) {
        await checkpoint();
      }

      const { timestamp, value } = history[index];
      const residual = value - dot(AdditiveModel.features(timestamp, origin, span, seasonalities), coefficients);
      squaredError += residual * residual;
    }

    const degreesOfFreedom = Math.max(history.length - width, 1);
    const sigma = Math.sqrt(squaredError / degreesOfFreedom);
    if (!Number.isFinite(sigma) || coefficients.some((value) => !Number.isFinite(value))) {
      throw new Error('Model fit did not converge to finite coefficients.');
    }

    return new AdditiveModel(origin, span, seasonalities, coefficients, sigma, history.length);
  }

  // This helper builds one design-matrix row: intercept, scaled trend, then Fourier pairs per seasonality.
  private static features(timestamp: number, origin: number, span: number, seasonalities: Seasonality[]): number[] {
    const row = [1, (timestamp - origin) / span];
    const days = timestamp / DAY_MS;

    for (const seasonality of seasonalities) {
      for (let k = 1; k <= seasonality.order; k += 1) {
        const angle = (2 * Math.PI * k * days) / seasonality.periodDays;
        row.push(Math.sin(angle), Math.cos(angle));
      }
    }

    return row;
  }

  // stepsAhead is 0 for history rows; bands widen with distance beyond the last observation.
  public predict(timestamp: number, stepsAhead = 0): Prediction {
    const yhat = dot(AdditiveModel.features(timestamp, this.origin, this.span, this.seasonalities), this.coefficients);
    const halfWidth = INTERVAL_Z * this.sigma * Math.sqrt(1 + stepsAhead / this.historyCount);

    return {
      timestamp,
      yhat,
      lower: yhat - halfWidth,
      upper: yhat + halfWidth
    };
  }
}

function dot(left: number[], right: number[]): number {
  let total = 0;
  for (let index = 0; index < left.length; index += 1) {
    total += left[index] * right[index];
  }
  return total;
}
