/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[telemetry:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[telemetry:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[telemetry:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[telemetry:counters] ${group}`, counters);
  },
};

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Creates a telemetry facade that logs all events to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@upgrade-advisor/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

/**
 * Wraps a facade so every event payload carries `context`. Keys in the
 * event's own data win over context keys.
 */
export function createContextualTelemetry(
  facade: TelemetryFacade,
  context: TelemetryEventData,
): TelemetryFacade {
  const merge = (data?: TelemetryEventData): TelemetryEventData => ({
    ...context,
    ...data,
  });
  return {
    recordError(event, data) {
      facade.recordError(event, merge(data));
    },
    recordWarning(event, data) {
      facade.recordWarning(event, merge(data));
    },
    recordProgress(event, data) {
      facade.recordProgress(event, merge(data));
    },
    recordCounters(group, counters) {
      facade.recordCounters(group, counters);
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(() => activeTelemetry.recordError(event, data));
  },
  recordWarning(event, data) {
    invokeSafely(() => activeTelemetry.recordWarning(event, data));
  },
  recordProgress(event, data) {
    invokeSafely(() => activeTelemetry.recordProgress(event, data));
  },
  recordCounters(group, counters) {
    invokeSafely(() => activeTelemetry.recordCounters(group, counters));
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

// Telemetry failures are reported to the console and never propagate.
function invokeSafely(invoke: () => void): void {
  try {
    invoke();
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
