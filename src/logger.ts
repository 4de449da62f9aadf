import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

type LevelChangeListener = (level: string, previous: string) => void;

const LOG_LEVELS: readonly string[] = [...Object.keys(pino.levels.values), 'silent'].sort();

const levelListeners = new Set<LevelChangeListener>();

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LOG_LEVELS.includes(value);
}

/** Detector name from a merging object such as `logger.warn({ detector }, msg)`. */
function detectorOf(args: readonly unknown[]): string | undefined {
  const [first] = args;
  if (first && typeof first === 'object' && 'detector' in first && typeof first.detector === 'string') {
    return first.detector;
  }
  return undefined;
}

const logger = pino({
  name: config.has('app.name') ? config.get<string>('app.name') : 'gridbox',
  level: config.has('logging.level') ? config.get<string>('logging.level') : 'info',
  hooks: {
    logMethod(args, method, level) {
      metrics.recordLogEvent(pino.levels.labels[level] ?? String(level), detectorOf(args));
      return method.apply(this, args);
    }
  }
});

metrics.recordLogLevelChange(logger.level);
metrics.onReset(() => {
  metrics.recordLogLevelChange(logger.level);
});

export function getLogLevel(): string {
  return logger.level;
}

export function getAvailableLogLevels(): string[] {
  return [...LOG_LEVELS];
}

export function setLogLevel(nextLevel: string): string {
  const level = nextLevel.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level "${level}" (available: ${LOG_LEVELS.join(', ')})`);
  }

  const previous = logger.level;
  if (previous !== level) {
    logger.level = level;
    metrics.recordLogLevelChange(level, previous);
    levelListeners.forEach(listener => listener(level, previous));
    logger.info({ level }, 'Log level updated');
  }
  return level;
}

export function onLogLevelChange(listener: LevelChangeListener) {
  levelListeners.add(listener);
  return () => {
    levelListeners.delete(listener);
  };
}

export default logger;
