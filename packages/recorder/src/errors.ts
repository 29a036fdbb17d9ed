// Recorder Errors
export class RecorderError extends Error {
  constructor(message: string) {
    super(message)
    this.name = `RecorderError`
  }
}

export class ContextMissingError extends RecorderError {
  constructor(entityName: string) {
    super(
      `Failed to begin subsegment '${entityName}': no trace entity is active in the current context`,
    )
    this.name = `ContextMissingError`
  }
}

export class EntityAlreadyClosedError extends RecorderError {
  constructor(entityId: string, entityName: string) {
    super(`Trace entity '${entityName}' (${entityId}) has already been closed`)
    this.name = `EntityAlreadyClosedError`
  }
}

export class InvalidTraceHeaderError extends RecorderError {
  constructor(header: string, details: string) {
    super(`Invalid trace header "${header}": ${details}`)
    this.name = `InvalidTraceHeaderError`
  }
}

export class InvalidRecorderConfigError extends RecorderError {
  constructor(message: string) {
    super(message)
    this.name = `InvalidRecorderConfigError`
  }
}

export class InvalidDaemonAddressError extends InvalidRecorderConfigError {
  constructor(address: string) {
    super(
      `Invalid daemon address "${address}": expected "host:port" with a port between 1 and 65535`,
    )
    this.name = `InvalidDaemonAddressError`
  }
}

export class InvalidContextMissingStrategyError extends InvalidRecorderConfigError {
  constructor(value: string) {
    super(
      `Invalid context missing strategy "${value}": expected one of LOG_ERROR, RUNTIME_ERROR, IGNORE_ERROR`,
    )
    this.name = `InvalidContextMissingStrategyError`
  }
}
