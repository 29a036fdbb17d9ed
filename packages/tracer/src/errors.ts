// Tracer Errors
export class TracingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = `TracingError`
  }
}

export class UnsupportedOperationError extends TracingError {
  constructor(message: string) {
    super(message)
    this.name = `UnsupportedOperationError`
  }
}

export class OperationNameImmutableError extends UnsupportedOperationError {
  constructor(operationName: string) {
    super(
      `Cannot rename span '${operationName}': trace entity names cannot be changed after creation`,
    )
    this.name = `OperationNameImmutableError`
  }
}

export class PropagationUnsupportedError extends UnsupportedOperationError {
  constructor(operation: `inject` | `extract`) {
    super(
      `Cannot ${operation} span context: wire propagation is not supported, use the trace header instead`,
    )
    this.name = `PropagationUnsupportedError`
  }
}
