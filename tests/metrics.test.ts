import { afterEach, describe, expect, it, vi } from 'vitest';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';
import logger, {
  getAvailableLogLevels,
  getLogLevel,
  onLogLevelChange,
  setLogLevel
} from '../src/logger.js';

describe('MetricsDetectorCounters', () => {
  it('tracks detector counters, gauges and errors', () => {
    const registry = new MetricsRegistry();

    registry.incrementDetectorCounter('grid', 'assignments', 3);
    registry.incrementDetectorCounter('grid', 'assignments');
    registry.incrementDetectorCounter('grid', 'collisions', Number.NaN);
    registry.setDetectorGauge('grid', 'loss.total', 2.4375);
    registry.recordDetectorError('grid', 'shape mismatch');

    const snapshot = registry.snapshot();
    expect(snapshot.detectors.grid.counters).toEqual({ assignments: 4, errors: 1 });
    expect(snapshot.detectors.grid.gauges).toEqual({ 'loss.total': 2.4375 });
    expect(snapshot.detectors.grid.lastErrorMessage).toBe('shape mismatch');
    expect(snapshot.detectors.grid.lastRunAt).not.toBeNull();
  });

  it('records latency observations with the timer helper', () => {
    const registry = new MetricsRegistry();

    const result = registry.time('detector.grid.decode', () => 42);
    registry.observeLatency('detector.grid.assign', 42);
    registry.observeLatency('detector.grid.assign', 120);

    expect(result).toBe(42);
    const snapshot = registry.snapshot();
    expect(snapshot.latencies['detector.grid.decode'].count).toBe(1);
    expect(snapshot.latencies['detector.grid.assign']).toEqual({
      count: 2,
      totalMs: 162,
      minMs: 42,
      maxMs: 120,
      averageMs: 81
    });
    expect(snapshot.histograms['detector.grid.assign']).toEqual({ '50': 1, '250': 1 });
  });

  it('records latency even when the timed function throws', () => {
    const registry = new MetricsRegistry();
    expect(() =>
      registry.time('detector.grid.loss', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(registry.snapshot().latencies['detector.grid.loss'].count).toBe(1);
  });

  it('buckets counts with the counter histogram', () => {
    const registry = new MetricsRegistry();
    registry.observeCount('detector.grid.detections', 0);
    registry.observeCount('detector.grid.detections', 1);
    registry.observeCount('detector.grid.detections', 3);
    registry.observeCount('detector.grid.detections', 5000);
    registry.observeCount('detector.grid.detections', Number.NaN);

    expect(registry.snapshot().histograms['detector.grid.detections']).toEqual({
      '0': 1,
      '1': 1,
      '5': 1,
      '+Inf': 1
    });
  });

  it('places observations on a bucket bound in that bucket', () => {
    const registry = new MetricsRegistry();
    registry.observeCount('detector.grid.detections', 1);
    registry.observeLatency('detector.grid.decode', 5);

    const lines = registry.exportPrometheus().split('\n');
    expect(lines).toContain('gridbox_detector_grid_detections_bucket{le="0"} 0');
    expect(lines).toContain('gridbox_detector_grid_detections_bucket{le="1"} 1');
    expect(lines).toContain('gridbox_detector_grid_decode_bucket{le="1"} 0');
    expect(lines).toContain('gridbox_detector_grid_decode_bucket{le="5"} 1');
    expect(registry.snapshot().histograms).toEqual({
      'detector.grid.detections': { '1': 1 },
      'detector.grid.decode': { '5': 1 }
    });
  });

  it('reset clears state and notifies listeners', () => {
    const registry = new MetricsRegistry();
    const listener = vi.fn();
    const detach = registry.onReset(listener);
    registry.incrementDetectorCounter('grid', 'decodes');

    registry.reset();
    expect(listener).toHaveBeenCalledTimes(1);
    expect(registry.snapshot().detectors).toEqual({});

    detach();
    registry.reset();
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('MetricsPrometheusExport', () => {
  it('exports log level, detector counters and gauges with sorted labels', () => {
    const registry = new MetricsRegistry();
    registry.incrementDetectorCounter('grid', 'decodes', 2);
    registry.incrementDetectorCounter('grid', 'candidates', 5);
    registry.setDetectorGauge('grid', 'loss.total', 2.4375);

    expect(registry.exportPrometheus().split('\n')).toEqual([
      '# HELP gridbox_log_level_state Active log level',
      '# TYPE gridbox_log_level_state gauge',
      'gridbox_log_level_state{level="info"} 1',
      '# HELP gridbox_detector_counter_total Detector counters grouped by detector and counter',
      '# TYPE gridbox_detector_counter_total counter',
      'gridbox_detector_counter_total{counter="candidates",detector="grid"} 5',
      'gridbox_detector_counter_total{counter="decodes",detector="grid"} 2',
      '# HELP gridbox_detector_gauge Last detector gauge values grouped by detector and gauge',
      '# TYPE gridbox_detector_gauge gauge',
      'gridbox_detector_gauge{detector="grid",gauge="loss.total"} 2.4375'
    ]);
  });

  it('exports latency histograms with cumulative buckets', () => {
    const registry = new MetricsRegistry();
    registry.observeLatency('detector.grid.decode', 3);
    registry.observeLatency('detector.grid.decode', 7);

    const lines = registry.exportPrometheus().split('\n');
    const start = lines.indexOf('# TYPE gridbox_detector_grid_decode histogram');
    expect(lines.slice(start)).toEqual([
      '# TYPE gridbox_detector_grid_decode histogram',
      'gridbox_detector_grid_decode_bucket{le="1"} 0',
      'gridbox_detector_grid_decode_bucket{le="5"} 1',
      'gridbox_detector_grid_decode_bucket{le="10"} 2',
      'gridbox_detector_grid_decode_bucket{le="25"} 2',
      'gridbox_detector_grid_decode_bucket{le="50"} 2',
      'gridbox_detector_grid_decode_bucket{le="100"} 2',
      'gridbox_detector_grid_decode_bucket{le="250"} 2',
      'gridbox_detector_grid_decode_bucket{le="500"} 2',
      'gridbox_detector_grid_decode_bucket{le="1000"} 2',
      'gridbox_detector_grid_decode_bucket{le="+Inf"} 2',
      'gridbox_detector_grid_decode_sum 10',
      'gridbox_detector_grid_decode_count 2'
    ]);
  });

  it('exports log events by level', () => {
    const registry = new MetricsRegistry();
    registry.recordLogEvent('warn', 'grid');
    registry.recordLogEvent('error');
    registry.recordLogEvent('warn');

    const lines = registry.exportPrometheus().split('\n');
    expect(lines.slice(0, 4)).toEqual([
      '# HELP gridbox_log_events_total Log events grouped by level',
      '# TYPE gridbox_log_events_total counter',
      'gridbox_log_events_total{level="error"} 1',
      'gridbox_log_events_total{level="warn"} 2'
    ]);
    expect(registry.snapshot().logs.byDetector).toEqual({ grid: { warn: 1 } });
  });
});

describe('LoggerLevels', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('starts at the level configured for tests', () => {
    expect(getLogLevel()).toBe('silent');
    expect(getAvailableLogLevels()).toEqual(['debug', 'error', 'fatal', 'info', 'silent', 'trace', 'warn']);
  });

  it('counts emitted log calls per level and detector', () => {
    metrics.reset();
    setLogLevel('warn');
    logger.warn({ detector: 'grid' }, 'first warning');
    logger.warn({ detector: 'grid' }, 'second warning');
    logger.info({ detector: 'grid' }, 'filtered by level');

    const snapshot = metrics.snapshot();
    expect(snapshot.logs.byDetector.grid).toEqual({ warn: 2 });
    expect(snapshot.logs.currentLevel).toBe('warn');
    expect(snapshot.logs.levelChanges).toEqual({ warn: 1 });
  });

  it('notifies listeners and validates level names', () => {
    const listener = vi.fn();
    const detach = onLogLevelChange(listener);

    expect(setLogLevel(' ERROR ')).toBe('error');
    expect(listener).toHaveBeenCalledWith('error', 'silent');
    expect(metrics.exportPrometheus().split('\n')).toContain('gridbox_log_level_state{level="error"} 1');
    expect(() => setLogLevel('verbose')).toThrow(
      'Unknown log level "verbose" (available: debug, error, fatal, info, silent, trace, warn)'
    );

    detach();
  });
});
