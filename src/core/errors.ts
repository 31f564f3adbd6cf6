/** Base class for every error the editor raises on purpose */
export class ManuscriptEditorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A configuration file exists but cannot be used */
export class ConfigError extends ManuscriptEditorError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${filePath}: ${message}`, options);
  }
}

export class ManuscriptNotFoundError extends ManuscriptEditorError {
  constructor(readonly contentDir: string) {
    super(`Manuscript content directory not found: ${contentDir}`);
  }
}

/** A filename rule names a prompt missing from the catalogue */
export class PromptNotFoundError extends ManuscriptEditorError {
  constructor(
    readonly promptName: string,
    readonly filename: string,
    readonly pattern: string,
  ) {
    super(
      `Prompt '${promptName}' (bound to '${pattern}', matched by '${filename}') is not defined in the prompt catalogue`,
    );
  }
}

/** The completion model could not revise a paragraph */
export class ModelError extends ManuscriptEditorError {}

/** Reassembled output lost or reordered a structural line */
export class StructuralMismatchError extends ManuscriptEditorError {
  constructor(
    readonly filename: string,
    readonly lineNumber: number,
    readonly expected: string | undefined,
    readonly actual: string | undefined,
  ) {
    super(
      `Structural line ${lineNumber} of ${filename} changed during revision: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`,
    );
  }
}
