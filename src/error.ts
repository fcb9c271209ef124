export class ContractError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConflictingFlagsError extends ContractError {
  public constructor() {
    super('Cannot pass both --quiet and --verbose flags');
  }
}

export class UnknownOptionError extends ContractError {
  public constructor(public readonly options: readonly string[]) {
    super(`Unknown unstable-options ${JSON.stringify(options)}`);
  }
}

/**
 * Never carries the secret URI or the underlying error, which may echo it.
 */
export class KeyDerivationError extends ContractError {
  public constructor(public readonly role: string) {
    super(`Failed to derive ${role} key pair from secret string`);
  }
}

export class CodeNotFoundError extends ContractError {
  public constructor(public readonly path: string, options?: ErrorOptions) {
    super(`Failed to read contract code at "${path}"`, options);
  }
}

export class MetadataReadError extends ContractError {
  public constructor(public readonly path: string, reason: string, options?: ErrorOptions) {
    super(`Failed to read project metadata at "${path}" (${reason})`, options);
  }
}

export class NothingToDeployError extends ContractError {
  public constructor() {
    super('Nothing to deploy. Empty deploy key of composable metadata.');
  }
}

export class NothingToBuildError extends ContractError {
  public constructor() {
    super('Nothing to build. Empty build key of composable metadata.');
  }
}

/**
 * Message is the remote error text as reported by the chain client.
 */
export class RemoteCallError extends ContractError {}

export class InvalidHexInputError extends ContractError {
  public constructor(public readonly field: string, input: string) {
    super(`Invalid "${field}" value "${input}" (even-length hex string expected)`);
  }
}

export class InvalidCodeHashLengthError extends ContractError {
  public constructor(public readonly length: number, public readonly expected: number) {
    super(`Code hash should be ${expected} bytes in length (got ${length})`);
  }
}

export class InvalidAccountIdLengthError extends ContractError {
  public constructor(public readonly length: number, public readonly expected: number) {
    super(`Target account should be ${expected} bytes in length (got ${length})`);
  }
}

export class InvalidNumberInputError extends ContractError {
  public constructor(public readonly field: string, input: string, expected: string) {
    super(`Invalid "${field}" value "${input}" (${expected} expected)`);
  }
}

export class InvalidUrlError extends ContractError {
  public constructor(public readonly url: string) {
    super(`Invalid node url "${url}" (ws:// or wss:// url expected)`);
  }
}

export class ConfigError extends ContractError {}

export class ToolchainError extends ContractError {}

export class ProjectExistsError extends ContractError {
  public constructor(public readonly path: string) {
    super(`A file or directory named "${path}" already exists`);
  }
}

export class InvalidProjectNameError extends ContractError {
  public constructor(public readonly projectName: string) {
    super(
      `Contract name "${projectName}" is invalid ` +
        '(letters, digits and underscores expected, starting with a letter)',
    );
  }
}

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const formatErrorChain = (error: unknown): string => {
  const messages: string[] = [];
  let current: unknown = error;
  while (current != null) {
    messages.push(errorMessage(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return messages.join(': ');
};
