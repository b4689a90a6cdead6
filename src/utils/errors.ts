export class CommandFailure extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    const detail = stderr.trim();
    super(`Command "${command}" exited with code ${exitCode}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandFailure';
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class QualityGateError extends Error {
  readonly gate: string;

  constructor(gate: string) {
    super(`Quality gate failed: ${gate}`);
    this.name = 'QualityGateError';
    this.gate = gate;
  }
}

export class MissingCredentialError extends Error {
  readonly variable: string;

  constructor(variable: string) {
    super(`${variable} environment variable is required`);
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

export class InputError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid input in ${path}: ${message}`);
    this.name = 'InputError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message = 'Invalid configuration') {
    super(message);
    this.name = 'ConfigError';
  }
}
