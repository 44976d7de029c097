import winston from 'winston';
import type { Request } from 'express';
import { env } from '../config/env.js';
import { getTraceContext } from '../observability/telemetry.js';

const traceCorrelationFormat = winston.format((info) => {
  const trace = getTraceContext();
  if (trace) {
    info.trace_id = trace.traceId;
    info.span_id = trace.spanId;
    if (trace.parentSpanId) {
      info.parent_span_id = trace.parentSpanId;
    }
  }
  return info;
});

interface StructuredErrorLog {
  trace_id: string | null;
  endpoint: string;
  status: number;
  error: string;
  [key: string]: unknown;
}

const isTest = env.NODE_ENV === 'test';

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: winston.format.combine(
    traceCorrelationFormat(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: isTest
    ? [new winston.transports.Console({ silent: true })]
    : [
      new winston.transports.File({ filename: 'error.log', level: 'error' }),
      new winston.transports.File({ filename: 'combined.log' })
    ]
});

if (!isTest && env.NODE_ENV !== 'production') {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), winston.format.simple())
  }));
}

export function buildRequestLogContext(req: Request) {
  return {
    trace_id: req.traceId ?? null,
    request_id: req.requestId ?? null,
    endpoint: req.originalUrl,
    method: req.method
  };
}

export function logStructuredError(payload: StructuredErrorLog) {
  logger.error('request.error', payload);
}
