export interface ActionRecord {
  seq: number;
  type: string;
  details: Record<string, unknown>;
  ok: boolean;
  error?: string;
  timestamp: string;
}

export interface NavigationRecord {
  url: string;
  timestamp: string;
}

export interface HistoryMark {
  actions: number;
  navigations: number;
  selectors: number;
}

export interface HistorySlice {
  actions: ActionRecord[];
  navigations: NavigationRecord[];
  selectors: string[];
}

export class ActionHistory {
  private actions: ActionRecord[] = [];
  private navigations: NavigationRecord[] = [];
  private selectors: string[] = [];
  private seq = 0;

  record(type: string, details: Record<string, unknown>, outcome: { ok: boolean; error?: string } = { ok: true }): ActionRecord {
    this.seq += 1;
    const entry: ActionRecord = {
      seq: this.seq,
      type,
      details,
      ok: outcome.ok,
      timestamp: new Date().toISOString()
    };
    if (outcome.error !== undefined) {
      entry.error = outcome.error;
    }
    this.actions.push(entry);
    return entry;
  }

  recordNavigation(url: string): void {
    this.navigations.push({ url, timestamp: new Date().toISOString() });
  }

  recordSelector(selector: string): void {
    this.selectors.push(selector);
  }

  mark(): HistoryMark {
    return {
      actions: this.actions.length,
      navigations: this.navigations.length,
      selectors: this.selectors.length
    };
  }

  since(mark: HistoryMark): HistorySlice {
    return {
      actions: this.actions.slice(mark.actions),
      navigations: this.navigations.slice(mark.navigations),
      selectors: this.selectors.slice(mark.selectors)
    };
  }

  all(): HistorySlice {
    return this.since({ actions: 0, navigations: 0, selectors: 0 });
  }

  clear(): void {
    this.actions = [];
    this.navigations = [];
    this.selectors = [];
  }
}
