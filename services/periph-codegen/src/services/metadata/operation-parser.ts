/**
 * Register Operation Parser
 *
 * Turns the `code` body of a policy method into typed register operations.
 * Statements are separated by newlines or `;`:
 *
 *   CR = 0x3          write
 *   CR |= EN_MASK     set bits
 *   CR &= ~0x1        clear bits
 *   CR.TXEN = 1       field write
 *   return DR         read
 *   return SR.RXNE    field read
 *   wait SR.TXE       busy-wait until the field is set
 *   wait !SR.BUSY     busy-wait until the field is clear
 */

import type { OperandValue, RegisterOperation } from '../../types';

export class OperationSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(message);
    this.name = 'OperationSyntaxError';
  }
}

const IDENT = '[A-Za-z_][A-Za-z0-9_]*';
const VALUE = `(?:0[xX][0-9A-Fa-f]+|0[bB][01]+|\\d+)[uU]?|${IDENT}`;

const PATTERNS = {
  fieldWrite: new RegExp(`^(${IDENT})\\.(${IDENT})\\s*=\\s*(${VALUE})$`),
  write: new RegExp(`^(${IDENT})\\s*=\\s*(${VALUE})$`),
  set: new RegExp(`^(${IDENT})\\s*\\|=\\s*(${VALUE})$`),
  clear: new RegExp(`^(${IDENT})\\s*&=\\s*~\\s*(${VALUE})$`),
  fieldRead: new RegExp(`^return\\s+(${IDENT})\\.(${IDENT})$`),
  read: new RegExp(`^return\\s+(${IDENT})$`),
  wait: new RegExp(`^wait\\s+(!?)\\s*(${IDENT})\\.(${IDENT})$`),
};

export function parseOperand(token: string): OperandValue {
  const literal = token.replace(/[uU]$/, '');
  if (/^0[xX]/.test(literal)) {
    return { kind: 'literal', value: parseInt(literal.slice(2), 16) };
  }
  if (/^0[bB]/.test(literal)) {
    return { kind: 'literal', value: parseInt(literal.slice(2), 2) };
  }
  if (/^\d+$/.test(literal)) {
    return { kind: 'literal', value: parseInt(literal, 10) };
  }
  return { kind: 'identifier', name: token };
}

function parseStatement(statement: string, line: number, column: number): RegisterOperation {
  let m: RegExpExecArray | null;

  if ((m = PATTERNS.fieldWrite.exec(statement))) {
    return { op: 'field-write', register: m[1], field: m[2], value: parseOperand(m[3]), line };
  }
  if ((m = PATTERNS.write.exec(statement))) {
    return { op: 'write', register: m[1], value: parseOperand(m[2]), line };
  }
  if ((m = PATTERNS.set.exec(statement))) {
    return { op: 'set', register: m[1], value: parseOperand(m[2]), line };
  }
  if ((m = PATTERNS.clear.exec(statement))) {
    return { op: 'clear', register: m[1], value: parseOperand(m[2]), line };
  }
  if ((m = PATTERNS.fieldRead.exec(statement))) {
    return { op: 'field-read', register: m[1], field: m[2], line };
  }
  if ((m = PATTERNS.read.exec(statement))) {
    return { op: 'read', register: m[1], line };
  }
  if ((m = PATTERNS.wait.exec(statement))) {
    return { op: 'wait', register: m[2], field: m[3], until: m[1] ? 'clear' : 'set', line };
  }

  throw new OperationSyntaxError(`unrecognized register operation '${statement}'`, line, column);
}

/**
 * Parse a method body. Blank statements and `//` comments are ignored.
 * Line numbers are 1-based within the body.
 */
export function parseOperations(code: string): RegisterOperation[] {
  const operations: RegisterOperation[] = [];
  const lines = code.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const commentAt = rawLine.indexOf('//');
    const text = commentAt >= 0 ? rawLine.slice(0, commentAt) : rawLine;
    let offset = 0;

    for (const chunk of text.split(';')) {
      const statement = chunk.trim();
      if (statement) {
        const column = offset + chunk.indexOf(statement) + 1;
        operations.push(parseStatement(statement, index + 1, column));
      }
      offset += chunk.length + 1;
    }
  });

  return operations;
}

/**
 * Registers referenced by a list of operations, in first-use order.
 */
export function referencedRegisters(operations: readonly RegisterOperation[]): string[] {
  return [...new Set(operations.map((operation) => operation.register))];
}
