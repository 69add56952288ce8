import { promises as fs } from 'fs';
import path from 'path';

export type DecisionAction = 'trade' | 'hedge' | 'skip' | 'block' | 'reject' | 'expire';

export type DecisionLogEntry = {
  ts: string;
  market_id: string;
  asset?: string;
  yes_price: number;
  no_price: number;
  action: DecisionAction;
  trigger?: 'crash' | 'ensemble' | 'hedge' | 'resolution';
  side?: 'YES' | 'NO' | 'BOTH';
  reason?: string;
  consensus?: number;
  confidence?: number;
  shares?: number;
  value_usd?: number;
  order_id?: string;
  pnl?: number;
};

export class DecisionLogger {
  private readonly path?: string;

  constructor(path?: string) {
    this.path = path || undefined;
  }

  get enabled(): boolean {
    return this.path !== undefined;
  }

  async append(entry: DecisionLogEntry): Promise<void> {
    if (!this.path) return;
    const line = `${JSON.stringify(entry)}\n`;
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, line, { encoding: 'utf8' });
  }
}
