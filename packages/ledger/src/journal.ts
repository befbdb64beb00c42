/**
 * @tollgate/ledger — Atomic scope.
 *
 * Every public mutating operation runs inside `Journal.atomically()`.
 * Each mutation records how to undo itself; each emission registers a
 * commit action. If the operation throws, the undo log is replayed in
 * reverse and no commit action runs. If it returns, the commit actions
 * run in registration order, still inside the scope, so a failing event
 * sink also rolls the operation back.
 *
 * Scopes do not nest. The core is synchronous; nothing here awaits.
 */

interface ActiveScope {
  readonly undo: (() => void)[];
  readonly commit: (() => void)[];
}

export class Journal {
  private _active: ActiveScope | undefined;

  /**
   * Run `work` as a single all-or-nothing unit.
   */
  atomically<T>(work: () => T): T {
    if (this._active !== undefined) {
      throw new Error("Atomic scopes do not nest");
    }

    const scope: ActiveScope = { undo: [], commit: [] };
    this._active = scope;

    try {
      const result = work();
      for (const action of scope.commit) {
        action();
      }
      return result;
    } catch (err) {
      for (let i = scope.undo.length - 1; i >= 0; i--) {
        scope.undo[i]!();
      }
      throw err;
    } finally {
      this._active = undefined;
    }
  }

  /**
   * Record the inverse of a mutation that has just been applied.
   */
  record(undo: () => void): void {
    this._requireScope().undo.push(undo);
  }

  /**
   * Register an action that runs only once the operation succeeds.
   */
  onCommit(action: () => void): void {
    this._requireScope().commit.push(action);
  }

  private _requireScope(): ActiveScope {
    if (this._active === undefined) {
      throw new Error("Ledger state can only change inside an atomic scope");
    }
    return this._active;
  }
}
