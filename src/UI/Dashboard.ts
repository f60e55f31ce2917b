import chalk, { type ChalkInstance } from 'chalk';
import { clearScreenDown, cursorTo } from 'readline';
import type { SharedStatus } from '../Monitor/SharedStatus';
import { getUnixEpoch } from '@utils/getUnixEpoch';
import { PeriodicTask } from '@utils/PeriodicTask';
import { type DashboardContext, renderStatus } from './renderStatus';

const HIDE_CURSOR = '\u001B[?25l';
const SHOW_CURSOR = '\u001B[?25h';

export interface DashboardOptions {
  status: SharedStatus;
  context: DashboardContext;
  refreshMs: number;
  output?: NodeJS.WritableStream;
  chalk?: ChalkInstance;
  now?: () => number;
}

/**
 * Full-screen repaint of the shared status at a fixed rate.
 */
export class Dashboard {
  private readonly output: NodeJS.WritableStream;
  private readonly chalk: ChalkInstance;
  private readonly now: () => number;
  private readonly task: PeriodicTask;

  constructor(private readonly options: DashboardOptions) {
    this.output = options.output ?? process.stdout;
    this.chalk = options.chalk ?? chalk;
    this.now = options.now ?? Date.now;
    this.task = new PeriodicTask({ name: 'Dashboard', intervalMs: options.refreshMs, run: () => this.render() });
  }

  start() {
    this.output.write(HIDE_CURSOR);
    this.task.start();
  }

  render() {
    const lines = renderStatus(this.options.status.snapshot(), this.options.context, getUnixEpoch(this.now()), this.chalk);
    cursorTo(this.output, 0, 0);
    clearScreenDown(this.output);
    this.output.write(`${lines.join('\n')}\n`);
  }

  async stop(): Promise<void> {
    await this.task.stop(0);
    this.output.write(`${SHOW_CURSOR}\n`);
  }
}
