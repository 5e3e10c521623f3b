/** The caller sent arguments the tool cannot act on. */
export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolInputError';
  }
}

export class UnknownToolError extends Error {
  constructor(readonly tool: string) {
    super(`Unknown tool '${tool}'`);
    this.name = 'UnknownToolError';
  }
}

/** The transport completed but handed back something unusable. */
export class RemoteOperationError extends Error {
  constructor(
    message: string,
    readonly remotePath: string,
  ) {
    super(message);
    this.name = 'RemoteOperationError';
  }
}

export class EncodingProvidersNotRegisteredError extends Error {
  constructor() {
    super('Encoding providers are not registered; call registerEncodingProviders() during startup');
    this.name = 'EncodingProvidersNotRegisteredError';
  }
}
