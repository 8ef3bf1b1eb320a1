export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EmptyDocumentError extends Error {
  code = 'EMPTY_DOCUMENT';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'EmptyDocumentError';
  }
}

export class LLMTransportError extends Error {
  code = 'LLM_TRANSPORT_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'LLMTransportError';
  }
}

export class StructuralValidationError extends Error {
  code = 'STRUCTURAL_VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'StructuralValidationError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class OutputPersistenceError extends Error {
  code = 'OUTPUT_PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'OutputPersistenceError';
  }
}
