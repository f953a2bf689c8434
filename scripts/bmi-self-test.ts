import { createLogger } from '../packages/shared/src/index.ts';
import {
  createEvaluationLogSink,
  loadEvaluatorConfig,
  runBmiSelfTest,
} from '../packages/evaluator/src/index.ts';

const { config, warnings } = loadEvaluatorConfig();
const logger = createLogger({
  baseContext: { module: 'bmi-self-test' },
  minLevel: config.logLevel,
});

for (const warning of warnings) {
  logger.warning(warning.message, warning.toDTO());
}

const result = runBmiSelfTest({ sink: createEvaluationLogSink(config) });

if (result.ok) {
  logger.debug('Self-test finished.', { evaluations: result.value.length });
} else {
  logger.error('Self-test failed.', result.error.toDTO());
  process.exitCode = 1;
}
