import fs from 'fs';
import path from 'path';
import { createLogger } from './log';

const log = createLogger('telemetry');

type MetricPayload = Record<string, unknown> & {
  name: string;
  duration_ms: number;
  ts: string;
};

export interface MetricStats {
  name: string;
  outcome: string;
  count: number;
  total: number;
  max: number;
  min: number;
}

const aggregates = new Map<string, MetricStats>();
let logFile: string | undefined;
let promFile: string | undefined;

export function configureTelemetry(options: { logFile?: string; promFile?: string } = {}) {
  logFile = options.logFile ? path.resolve(process.cwd(), options.logFile) : undefined;
  promFile = options.promFile ? path.resolve(process.cwd(), options.promFile) : undefined;
}

/**
 * Starts timing an operation. The returned function records it; pass
 * `outcome` ("ok" unless told otherwise) and any counters worth keeping.
 */
export function startTimer(name: string, attributes: Record<string, unknown> = {}) {
  const start = Date.now();
  return (extra: Record<string, unknown> = {}) => {
    const payload: MetricPayload = {
      name,
      duration_ms: Date.now() - start,
      ts: new Date().toISOString(),
      ...attributes,
      ...extra,
    };
    writeMetric(payload);
    return payload;
  };
}

export function telemetrySnapshot(): MetricStats[] {
  return Array.from(aggregates.values(), stats => ({ ...stats })).sort(
    (a, b) => a.name.localeCompare(b.name) || a.outcome.localeCompare(b.outcome),
  );
}

export function resetTelemetry() {
  aggregates.clear();
}

function ensureDir(filePath: string) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

function writeMetric(m: MetricPayload) {
  updateAggregates(m);
  if (logFile) {
    try {
      ensureDir(logFile);
      fs.appendFileSync(logFile, JSON.stringify(m) + '\n', 'utf8');
    } catch (err) {
      log.warn(`failed to write ${logFile}`, err);
    }
  }
  if (promFile) emitPrometheus(promFile);
}

function updateAggregates(m: MetricPayload) {
  const outcome = typeof m.outcome === 'string' ? m.outcome : 'ok';
  const key = `${m.name}:${outcome}`;
  const entry = aggregates.get(key) ?? {
    name: m.name,
    outcome,
    count: 0,
    total: 0,
    max: Number.MIN_SAFE_INTEGER,
    min: Number.MAX_SAFE_INTEGER,
  };
  entry.count += 1;
  entry.total += m.duration_ms;
  entry.max = Math.max(entry.max, m.duration_ms);
  entry.min = Math.min(entry.min, m.duration_ms);
  aggregates.set(key, entry);
}

export function renderPrometheus(stats: MetricStats[] = telemetrySnapshot()): string {
  const lines: string[] = [
    '# HELP code_recall_operation_duration_ms Operation durations in milliseconds.',
    '# TYPE code_recall_operation_duration_ms summary',
  ];
  for (const s of stats) {
    const labels = `{name="${s.name}",outcome="${s.outcome}"}`;
    const avg = s.count ? s.total / s.count : 0;
    lines.push(`code_recall_operation_duration_ms_count${labels} ${s.count}`);
    lines.push(`code_recall_operation_duration_ms_sum${labels} ${s.total}`);
    lines.push(`code_recall_operation_duration_ms_avg${labels} ${avg.toFixed(2)}`);
    lines.push(`code_recall_operation_duration_ms_max${labels} ${s.max}`);
    lines.push(`code_recall_operation_duration_ms_min${labels} ${s.min}`);
  }
  return lines.join('\n') + '\n';
}

function emitPrometheus(file: string) {
  try {
    ensureDir(file);
    fs.writeFileSync(file, renderPrometheus(), 'utf8');
  } catch (err) {
    log.warn(`failed to write ${file}`, err);
  }
}
