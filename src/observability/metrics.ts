import { performance } from 'node:perf_hooks';
import type { NextFunction, Request, Response } from 'express';

export type RouteSnapshot = {
  route: string;
  requests: number;
  errors: number;
  errorRate: number;
  p95Ms: number;
  p99Ms: number;
};

export type DependencySnapshot = {
  dependency: string;
  operation: string;
  calls: number;
  errors: number;
  errorRate: number;
  avgMs: number;
};

type MinuteWindow = { timestamp: number; count: number; errors: number; durations: number[] };

const WINDOW_MS = 15 * 60 * 1000;
export const UNMATCHED_ROUTE = '(unmatched)';
const routeWindows = new Map<string, MinuteWindow[]>();
const dependencyWindows = new Map<string, MinuteWindow[]>();

function quantile(values: number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(sorted.length - 1, Math.ceil(sorted.length * q) - 1);
  return sorted[index] ?? 0;
}

function record(map: Map<string, MinuteWindow[]>, key: string, durationMs: number, isError: boolean) {
  const minuteStamp = Math.floor(Date.now() / 60_000) * 60_000;
  const floor = Date.now() - WINDOW_MS;
  const windows = (map.get(key) ?? []).filter((item) => item.timestamp >= floor);
  const current = windows.find((item) => item.timestamp === minuteStamp);
  if (current) {
    current.count += 1;
    current.errors += isError ? 1 : 0;
    current.durations.push(durationMs);
  } else {
    windows.push({ timestamp: minuteStamp, count: 1, errors: isError ? 1 : 0, durations: [durationMs] });
  }
  map.set(key, windows);
}

// Drops expired windows, and keys left with none.
function prune(map: Map<string, MinuteWindow[]>) {
  const floor = Date.now() - WINDOW_MS;
  for (const [key, windows] of map) {
    const live = windows.filter((item) => item.timestamp >= floor);
    if (live.length) {
      map.set(key, live);
    } else {
      map.delete(key);
    }
  }
}

function totals(windows: MinuteWindow[]) {
  const count = windows.reduce((sum, w) => sum + w.count, 0);
  const errors = windows.reduce((sum, w) => sum + w.errors, 0);
  return { count, errors, durations: windows.flatMap((w) => w.durations) };
}

export function nowMs() {
  return performance.now();
}

export function recordRouteMetric(route: string, durationMs: number, statusCode: number) {
  record(routeWindows, route, durationMs, statusCode >= 500);
}

export function recordDependencyMetric(dependency: string, operation: string, durationMs: number, isError: boolean) {
  record(dependencyWindows, `${dependency}:${operation}`, durationMs, isError);
}

export function getRouteSnapshots(): RouteSnapshot[] {
  prune(routeWindows);
  return [...routeWindows.entries()].map(([route, windows]) => {
    const { count, errors, durations } = totals(windows);
    return {
      route,
      requests: count,
      errors,
      errorRate: count ? errors / count : 0,
      p95Ms: quantile(durations, 0.95),
      p99Ms: quantile(durations, 0.99)
    };
  }).sort((a, b) => b.requests - a.requests);
}

export function getDependencySnapshots(): DependencySnapshot[] {
  prune(dependencyWindows);
  return [...dependencyWindows.entries()].map(([key, windows]) => {
    const [dependency, operation] = key.split(':');
    const { count, errors, durations } = totals(windows);
    return {
      dependency: dependency ?? 'unknown',
      operation: operation ?? 'operation',
      calls: count,
      errors,
      errorRate: count ? errors / count : 0,
      avgMs: durations.length ? durations.reduce((sum, value) => sum + value, 0) / durations.length : 0
    };
  }).sort((a, b) => b.calls - a.calls);
}

export function createRouteMetricMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = nowMs();
    res.on('finish', () => {
      const path = req.route?.path;
      const route = typeof path === 'string'
        ? `${req.method} ${req.baseUrl}${path}`.replace(/\/+/g, '/')
        : `${req.method} ${UNMATCHED_ROUTE}`;
      recordRouteMetric(route, nowMs() - start, res.statusCode);
    });
    next();
  };
}
