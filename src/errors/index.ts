/**
 * Custom Error Classes
 */

export class AccountsError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'ACCOUNTS_ERROR') {
    super(message);
    this.name = 'AccountsError';
    this.code = code;
  }
}

export class InsufficientBalanceError extends AccountsError {
  public userId: string;
  public required: number;
  public available: number;

  constructor(userId: string, required: number, available: number) {
    super(
      `Insufficient balance for user ${userId}: required ${required}, available ${available}`,
      'INSUFFICIENT_BALANCE',
    );
    this.name = 'InsufficientBalanceError';
    this.userId = userId;
    this.required = required;
    this.available = available;
  }
}

/**
 * Inputs do not cover amount plus fee at build time.
 * Selection targets amount + fee, so reaching this is a bug.
 */
export class NegativeChangeError extends AccountsError {
  public total: number;
  public amount: number;
  public fee: number;

  constructor(total: number, amount: number, fee: number) {
    super(
      `Negative change: inputs ${total} cannot pay amount ${amount} plus fee ${fee}`,
      'NEGATIVE_CHANGE',
    );
    this.name = 'NegativeChangeError';
    this.total = total;
    this.amount = amount;
    this.fee = fee;
  }
}

export class InvalidAmountError extends AccountsError {
  public amount: unknown;

  constructor(amount: unknown, message = `Invalid amount: ${String(amount)}`) {
    super(message, 'INVALID_AMOUNT');
    this.name = 'InvalidAmountError';
    this.amount = amount;
  }
}

export class InvalidTransferError extends AccountsError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSFER');
    this.name = 'InvalidTransferError';
  }
}

export class InvalidAddressError extends AccountsError {
  public address: string;

  constructor(address: string) {
    super(`Invalid address: ${address}`, 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

export class InvalidTransactionError extends AccountsError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSACTION');
    this.name = 'InvalidTransactionError';
  }
}

export class UnknownAccountError extends AccountsError {
  public userId: string;

  constructor(userId: string) {
    super(`Unknown account: ${userId}`, 'UNKNOWN_ACCOUNT');
    this.name = 'UnknownAccountError';
    this.userId = userId;
  }
}

export class DuplicateAccountError extends AccountsError {
  public accountName: string;

  constructor(accountName: string) {
    super(`Account already exists: ${accountName}`, 'DUPLICATE_ACCOUNT');
    this.name = 'DuplicateAccountError';
    this.accountName = accountName;
  }
}

/**
 * A node RPC command failed, either at the transport or inside the node
 */
export class NodeCommandError extends AccountsError {
  public method: string;
  public rpcCode?: number | undefined;
  public status?: number | undefined;

  constructor(
    method: string,
    message: string,
    options: { rpcCode?: number | undefined; status?: number | undefined } = {},
  ) {
    super(`Node command ${method} failed: ${message}`, 'NODE_COMMAND_FAILED');
    this.name = 'NodeCommandError';
    this.method = method;
    this.rpcCode = options.rpcCode;
    this.status = options.status;
  }
}

export class ConfigurationError extends AccountsError {
  public errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed: ${errors.join(', ')}`, 'CONFIGURATION');
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
