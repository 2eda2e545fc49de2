import type { SearchResult } from './messages';

export interface ReportContext {
    prefix: string;
    saltPrefix?: string;
    // 1-based position in a batch; omitted for single results
    index?: number;
}

export interface ResultReporter {
    report(result: SearchResult, context: ReportContext): void;
}

export function formatResult(result: SearchResult, context: ReportContext): string[] {
    const saltLabel = context.saltPrefix === undefined ? 'salt string' : `salt string for salt prefix ${context.saltPrefix}`;
    const lines = [
        `vanity address: ${result.address}`,
        `${saltLabel}: ${result.salt}`,
        `hashed salt for prefix ${context.prefix}: ${result.digestHex}`,
    ];

    if (context.index === undefined) {
        return lines;
    }
    return [`result ${context.index}:`, ...lines.map((line) => `  ${line}`)];
}

export class ConsoleReporter implements ResultReporter {
    constructor(private readonly writeLine: (line: string) => void = (line) => console.log(line)) {}

    report(result: SearchResult, context: ReportContext) {
        for (const line of formatResult(result, context)) {
            this.writeLine(line);
        }
    }
}
