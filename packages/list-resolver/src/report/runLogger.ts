import fs from 'node:fs';
import path from 'node:path';

import type { RunSummary, TitleOutcome } from '../shared/types.js';

export class RunLogger {
  private readonly logDir: string;
  private readonly statusDir: string;

  constructor(reportDir: string) {
    this.logDir = path.join(reportDir, 'logs');
    this.statusDir = path.join(reportDir, 'status');
  }

  private ensureDirs() {
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.mkdirSync(this.statusDir, { recursive: true });
  }

  writeLog(outcomes: TitleOutcome[], at: Date = new Date()): string {
    this.ensureDirs();
    const ts = at.toISOString().replace(/[:.]/g, '-');
    const filePath = path.join(this.logDir, `${ts}.json`);
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(outcomes, null, 2));
    fs.renameSync(tmpPath, filePath);
    return filePath;
  }

  writeStatus(summary: RunSummary): string {
    this.ensureDirs();
    const filePath = path.join(this.statusDir, 'last-run.json');
    fs.writeFileSync(filePath, JSON.stringify(summary, null, 2));
    return filePath;
  }
}
