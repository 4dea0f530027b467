// This module wraps the additive model behind a narrow forecasting contract that reports failures as data.

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { ForecastFailure, ForecastInput, ForecastOutcome, ForecastRow } from '../types/domain.js';
import { errorForLog } from '../utils/logger.js';
import { AdditiveModel, FIT_CHUNK_ROWS, type Observation, type Prediction } from './model.js';
import { formatTimestamp, inferCadenceMs, isFormattableTimestamp, parseIsoTimestamp } from './time.js';

export interface Forecaster {
  forecast(input: ForecastInput, signal?: AbortSignal): Promise<ForecastOutcome>;
}

class ForecastInputError extends Error {}

class ForecastCancelledError extends Error {
  public constructor() {
    super('Forecast cancelled.');
  }
}

// This helper yields to the event loop so timers and other requests run, then stops if the caller gave up.
async function checkpoint(signal?: AbortSignal): Promise<void> {
  await yieldToEventLoop();
  if (signal?.aborted) {
    throw new ForecastCancelledError();
  }
}

// This helper parses and aggregates raw ds/y pairs into ascending observations with distinct timestamps.
async function buildObservations(ds: string[], y: number[], signal?: AbortSignal): Promise<Observation[]> {
  if (ds.length !== y.length) {
    throw new ForecastInputError(`ds and y must have the same length (got ${ds.length} and ${y.length}).`);
  }

  if (ds.length < 2) {
    throw new ForecastInputError('At least 2 observations are required to fit a forecast model.');
  }

  const buckets = new Map<number, { sum: number; count: number }>();
  for (let index = 0; index < ds.length; index += 1) {
    if (index > 0 && index % FIT_CHUNK_ROWS === 0) {
      await checkpoint(signal);
    }

    const raw = ds[index];
    const timestamp = parseIsoTimestamp(raw);
    if (timestamp === null) {
      throw new ForecastInputError(`Invalid date at ds[${index}]: ${raw}`);
    }

    const value = y[index];
    if (!Number.isFinite(value)) {
      throw new ForecastInputError(`Invalid value at y[${index}]: ${String(value)}`);
    }

    const bucket = buckets.get(timestamp) ?? { sum: 0, count: 0 };
    bucket.sum += value;
    bucket.count += 1;
    buckets.set(timestamp, bucket);
  }

  if (buckets.size < 2) {
    throw new ForecastInputError('At least 2 distinct timestamps are required to fit a forecast model.');
  }

  return [...buckets.entries()]
    .map(([timestamp, bucket]) => ({ timestamp, value: bucket.sum / bucket.count }))
    .sort((left, right) => left.timestamp - right.timestamp);
}

// This class is the default forecaster: it fits an additive model per call and never throws for model failures.
// Work is split into chunks so a long fit shares the event loop and honours the abort signal.
export class AdditiveForecaster implements Forecaster {
  private readonly logger?: FastifyBaseLogger;

  public constructor(logger?: FastifyBaseLogger) {
    this.logger = logger?.child({
      component: 'forecaster'
    });
  }

  public async forecast(input: ForecastInput, signal?: AbortSignal): Promise<ForecastOutcome> {
    try {
      await checkpoint(signal);

      if (!Number.isInteger(input.periods) || input.periods < 1) {
        throw new ForecastInputError(`periods must be a positive integer (got ${String(input.periods)}).`);
      }

      const history = await buildObservations(input.ds, input.y, signal);
      const cadenceMs = inferCadenceMs(history.map((observation) => observation.timestamp));
      const last = history[history.length - 1].timestamp;
      if (!isFormattableTimestamp(last + input.periods * cadenceMs)) {
        throw new ForecastInputError(
          `Forecast horizon of ${input.periods} periods after ${formatTimestamp(last)} extends past year 9999.`
        );
      }

      const model = await AdditiveModel.fit(history, cadenceMs, () => checkpoint(signal));

      const rows: ForecastRow[] = [];
      for (let index = 0; index < history.length; index += 1) {
        if (index > 0 && index % FIT_CHUNK_ROWS === 0) {
          await checkpoint(signal);
        }
        rows.push(toRow(model.predict(history[index].timestamp)));
      }
      for (let step = 1; step <= input.periods; step += 1) {
        if (step % FIT_CHUNK_ROWS === 0) {
          await checkpoint(signal);
        }
        rows.push(toRow(model.predict(last + step * cadenceMs, step)));
      }

      this.logger?.debug(
        {
          event: 'forecast_model_fitted',
          nHistory: input.ds.length,
          distinctTimestamps: history.length,
          cadenceMs,
          seasonalities: model.seasonalities.map((seasonality) => seasonality.name),
          sigma: model.sigma,
          periods: input.periods
        },
        'forecast_model_fitted'
      );

      return {
        meta: {
          periods: input.periods,
          n_history: input.ds.length,
          start: formatTimestamp(history[0].timestamp),
          end: formatTimestamp(last)
        },
        forecast: rows
      };
    } catch (error) {
      if (error instanceof ForecastCancelledError) {
        this.logger?.debug({ event: 'forecast_cancelled' }, 'forecast_cancelled');
      } else if (!(error instanceof ForecastInputError)) {
        this.logger?.warn(
          {
            event: 'forecast_model_failed',
            error: errorForLog(error)
          },
          'forecast_model_failed'
        );
      }

      return { error: error instanceof Error ? error.message : String(error) };
    }
  }
}

function toRow(prediction: Prediction): ForecastRow {
  return {
    ds: formatTimestamp(prediction.timestamp),
    yhat: prediction.yhat,
    yhat_lower: prediction.lower,
    yhat_upper: prediction.upper
  };
}

// This helper narrows a forecast outcome to its failure branch.
export function isForecastFailure(outcome: ForecastOutcome): outcome is ForecastFailure {
  return 'error' in outcome;
}
