import { FindOperator, ILike } from 'typeorm';

/**
 * Case-insensitive substring match with LIKE wildcards in the input escaped.
 */
export function containsInsensitive(term: string): FindOperator<string> {
  const escaped = term.replace(/[\\%_]/g, (char) => `\\${char}`);
  return ILike(`%${escaped}%`);
}
