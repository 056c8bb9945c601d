import { Injectable } from '@nestjs/common';
import { OutputFormat } from '../../infrastructure/config/broker.config';
import { PingReport } from '../dto/ping-report.dto';

export enum ExitCode {
  OK = 0,
  NO_REPLIES = 1,
  FAILURE = 2,
}

export interface FormattedReport {
  text: string;
  exitCode: ExitCode;
}

export const NO_REPLIES_MESSAGE = 'Error: No nodes replied within time constraint.';

@Injectable()
export class PingResultFormatter {
  format(report: PingReport, format: OutputFormat): FormattedReport {
    const exitCode = report.workers.length > 0 ? ExitCode.OK : ExitCode.NO_REPLIES;
    const text = format === 'json' ? this.toJson(report) : this.toText(report);
    return { text, exitCode };
  }

  private toText(report: PingReport): string {
    const count = report.workers.length;
    if (count === 0) {
      return NO_REPLIES_MESSAGE;
    }
    const lines = report.workers.map((worker) => `${worker.identity}: OK ${worker.status}`);
    lines.push(`${count} ${count === 1 ? 'node' : 'nodes'} online.`);
    return lines.join('\n');
  }

  private toJson(report: PingReport): string {
    const body: Record<string, { ok: string }> = {};
    for (const worker of report.workers) {
      body[worker.identity] = { ok: worker.status };
    }
    return JSON.stringify(body, null, 2);
  }
}
