import { CommentStyle } from '../types';
import { formatNumber } from '../utils/format';
import { ARGUMENT_ORDER, InstructionRecord } from './instructions';

export interface SerializeOptions {
  precision: number;
  commentStyle: CommentStyle;
  lineNumbers: boolean;
}

const DEFAULT_OPTIONS: SerializeOptions = {
  precision: 3,
  commentStyle: 'paren',
  lineNumbers: false
};

function renderComment(text: string, style: CommentStyle): string {
  const singleLine = text.replace(/[\r\n]+/g, ' ').trim();
  if (style === 'semicolon') {
    return `; ${singleLine}`;
  }
  // Parenthesised comments cannot nest
  return `(${singleLine.replace(/\(/g, '[').replace(/\)/g, ']')})`;
}

export function serializeRecord(record: InstructionRecord, options: Partial<SerializeOptions> = {}): string {
  const { precision, commentStyle } = { ...DEFAULT_OPTIONS, ...options };

  switch (record.family) {
    case 'comment':
      return renderComment(record.text, commentStyle);
    case 'programStart':
      return [record.opcode, ...record.modes].join(' ');
    case 'programEnd':
      return record.opcode;
    case 'motion':
    case 'state': {
      const words: string[] = [record.opcode];
      for (const letter of ARGUMENT_ORDER[record.opcode]) {
        const value = record.args[letter];
        if (value !== undefined) {
          words.push(`${letter}${formatNumber(value, precision)}`);
        }
      }
      return words.join(' ');
    }
  }
}

/**
 * Renders instruction records to program text, one line per record, each
 * terminated by "\n". Comments are never numbered.
 */
export function serializeProgram(records: readonly InstructionRecord[], options: Partial<SerializeOptions> = {}): string {
  const resolved = { ...DEFAULT_OPTIONS, ...options };
  let lineNumber = 0;
  let text = '';

  for (const record of records) {
    const body = serializeRecord(record, resolved);
    if (resolved.lineNumbers && record.family !== 'comment') {
      lineNumber += 1;
      text += `N${lineNumber} ${body}\n`;
    } else {
      text += `${body}\n`;
    }
  }

  return text;
}
