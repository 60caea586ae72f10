export class SessionBusyError extends Error {
  constructor(sessionName: string) {
    super(`Dataset "${sessionName}" is still materializing; wait for it or cancel it first`)
    this.name = 'SessionBusyError'
  }
}

export class SessionClosedError extends Error {
  constructor(sessionName: string) {
    super(`Dataset "${sessionName}" has been closed`)
    this.name = 'SessionClosedError'
  }
}

export class OperationNotFoundError extends Error {
  readonly operationId: string

  constructor(operationId: string) {
    super(`Operation ${operationId} is not in the history`)
    this.name = 'OperationNotFoundError'
    this.operationId = operationId
  }
}
