import { AppError, createLogger, isLogLevel, type LogLevel, type LogWriter } from '@bmi-kit/shared';
import { createLoggerLineSink, stdoutLineSink, type EvaluationLineSink } from './evaluation-log.ts';

export type EvaluationLogMode = 'text' | 'json';

export interface EvaluatorConfig {
  logMode: EvaluationLogMode;
  logLevel: LogLevel;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const DEFAULT_CONFIG: EvaluatorConfig = {
  logMode: 'text',
  logLevel: 'info',
};

export interface LoadedEvaluatorConfig {
  config: EvaluatorConfig;
  /** One entry per variable that was set but not understood. */
  warnings: AppError[];
}

function createIgnoredValueWarning(variable: string, value: string, fallback: string): AppError {
  return AppError.warning(
    'BMI_CONFIG_IGNORED',
    `Unknown ${variable} value "${value}", using "${fallback}".`,
    { variable, value, fallback },
  );
}

function resolveLogMode(value: string | undefined, warnings: AppError[]): EvaluationLogMode {
  if (value === 'text' || value === 'json') {
    return value;
  }
  if (value) {
    warnings.push(createIgnoredValueWarning('BMI_LOG_MODE', value, DEFAULT_CONFIG.logMode));
  }
  return DEFAULT_CONFIG.logMode;
}

function resolveLogLevel(value: string | undefined, warnings: AppError[]): LogLevel {
  if (value && isLogLevel(value)) {
    return value;
  }
  if (value) {
    warnings.push(createIgnoredValueWarning('BMI_LOG_LEVEL', value, DEFAULT_CONFIG.logLevel));
  }
  return DEFAULT_CONFIG.logLevel;
}

/**
 * Reads `BMI_LOG_MODE` (`text` | `json`) and `BMI_LOG_LEVEL`.
 * Unset values fall back to the defaults silently, unknown ones with a warning.
 */
export function loadEvaluatorConfig(env: EnvSource = process.env): LoadedEvaluatorConfig {
  const warnings: AppError[] = [];
  const config: EvaluatorConfig = {
    logMode: resolveLogMode(env.BMI_LOG_MODE, warnings),
    logLevel: resolveLogLevel(env.BMI_LOG_LEVEL, warnings),
  };
  return { config, warnings };
}

export interface CreateEvaluationLogSinkDependencies {
  textSink?: EvaluationLineSink;
  jsonWriter?: LogWriter;
  now?: () => string;
}

export function createEvaluationLogSink(
  config: EvaluatorConfig,
  dependencies: CreateEvaluationLogSinkDependencies = {},
): EvaluationLineSink {
  if (config.logMode === 'text') {
    return dependencies.textSink ?? stdoutLineSink;
  }

  const logger = createLogger({
    baseContext: { module: 'bmi-evaluator' },
    minLevel: config.logLevel,
    writer: dependencies.jsonWriter,
    now: dependencies.now,
  });
  return createLoggerLineSink(logger);
}
