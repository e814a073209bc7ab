import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BatchResult } from '../scan/types';
import { renderHumanReport } from './human-report';
import { toMachineReport } from './machine-report';

@Injectable()
export class ReportWriter {
  private readonly logger = new Logger(ReportWriter.name);

  async writeMachineReport(path: string, batch: BatchResult): Promise<void> {
    await this.write(path, JSON.stringify(toMachineReport(batch), null, 2));
    this.logger.log(`JSON report written: ${path}`);
  }

  async writeHumanReport(path: string, batch: BatchResult): Promise<void> {
    await this.write(path, renderHumanReport(batch));
    this.logger.log(`report written: ${path}`);
  }

  private async write(path: string, content: string) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content.endsWith('\n') ? content : `${content}\n`);
  }
}
