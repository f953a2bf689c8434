// Types
export { type Result, type Ok, type Err, ok, err, unwrap } from './types/result.ts';

// Errors
export { AppError, AppErrorSchema, SEVERITY, type Severity, type AppErrorDTO } from './errors/app-error.ts';

// DTOs
export {
  BMI_CATEGORIES,
  BmiCategorySchema,
  type BmiCategory,
  BmiEvaluationInputDTOSchema,
  type BmiEvaluationInputDTO,
  BmiEvaluationResultDTOSchema,
  type BmiEvaluationResultDTO,
  BmiEvaluationResponseSchema,
  type BmiEvaluationResponse,
  type BmiEvaluationOk,
  type BmiEvaluationErr,
} from './dto/bmi.ts';

// Logger
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';
