import { Rows } from '../data/rows';
import type { Value } from '../value/value';

/**
 * Outcome of one dispatched statement
 */
export type ExecuteResult =
  | { kind: 'rows'; rows: Rows }
  | { kind: 'affected'; affected: number; lastInsertId?: Value }
  | { kind: 'none' };

export const ExecuteResult = {
  rows(rows: Rows): ExecuteResult {
    return { kind: 'rows', rows };
  },

  affected(affected: number, lastInsertId?: Value): ExecuteResult {
    return { kind: 'affected', affected, lastInsertId };
  },

  none(): ExecuteResult {
    return { kind: 'none' };
  },

  /**
   * Rows carried by the result; statements without a result set yield none
   */
  rowsOf(result: ExecuteResult): Rows {
    return result.kind === 'rows' ? result.rows : new Rows();
  },

  affectedOf(result: ExecuteResult): number {
    switch (result.kind) {
      case 'rows':
        return result.rows.length;
      case 'affected':
        return result.affected;
      case 'none':
        return 0;
    }
  },
};
