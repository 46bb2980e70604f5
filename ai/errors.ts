export type TrainingErrorCode =
  | 'INDEX_OUT_OF_RANGE'
  | 'OBSERVATION_SHAPE_MISMATCH'
  | 'ENVIRONMENT_FAILURE'
  | 'PARAMETER_STORE_UNAVAILABLE'
  | 'GRADIENT_SHAPE_MISMATCH'
  | 'CHECKPOINT_FAILURE'
  | 'INVALID_CONFIG';

export type TrainingErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: TrainingErrorContext): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

export class TrainingRuntimeError<C extends TrainingErrorCode = TrainingErrorCode> extends Error {
  readonly code: C;
  readonly context?: TrainingErrorContext;

  constructor(code: C, message: string, context?: TrainingErrorContext, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'TrainingRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function isTrainingRuntimeError(error: unknown): error is TrainingRuntimeError {
  return error instanceof TrainingRuntimeError;
}

export function isTrainingErrorCode<C extends TrainingErrorCode>(
  error: unknown,
  code: C,
): error is TrainingRuntimeError<C> {
  return isTrainingRuntimeError(error) && error.code === code;
}

export function indexOutOfRange(message: string, context?: TrainingErrorContext): TrainingRuntimeError<'INDEX_OUT_OF_RANGE'> {
  return new TrainingRuntimeError('INDEX_OUT_OF_RANGE', message, context);
}
