import type { CrawlSummary, PageResult } from '../types.js';

let quietMode = false;

export function writePage(page: PageResult): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(renderPage(page));
}

export function writeSummary(summary: CrawlSummary): void {
  process.stdout.write(renderTextSummary(summary));
}

export function logError(message: string): void {
  if (quietMode) {
    return;
  }

  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function setOutputConfig(config: { quiet: boolean }): void {
  quietMode = config.quiet;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function renderPage(page: PageResult): string {
  const status = page.status === null ? '' : ` [${page.status}]`;
  return `VISITED (depth ${page.depth})${status}: ${page.url}\n`;
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Exit reason: ${summary.exitReason}${summary.resumed ? ' (resumed)' : ''}`,
    `Processed: ${summary.processedCount}`,
    `Fetch attempts: ${summary.fetchAttempts}`,
    `Successful pages: ${summary.pagesSucceeded}`,
    `Failed pages: ${summary.pagesFailed}`,
    `Skipped pages: ${summary.pagesSkipped}`,
    `Unique URLs discovered: ${summary.uniqueUrlsDiscovered}`,
    `Still pending: ${summary.pendingUrls}`,
    `Total links extracted: ${summary.totalLinksExtracted}`,
    `Max depth reached: ${summary.maxDepth}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Peak queue size: ${summary.peakQueueSize}`,
    `Duplicates filtered: ${summary.duplicatesFiltered}`,
    `Retries scheduled: ${summary.retryAttempts}`,
    `Retry successes: ${summary.retrySuccesses}`,
    `Rate-limit responses: ${summary.rateLimitHits}`,
  ];

  if (summary.skippedDomains.length > 0) {
    lines.push(`Skipped domains: ${summary.skippedDomains.join(', ')}`);
  }

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  const failureEntries = Object.entries(summary.failureReasons).sort(([, countA], [, countB]) =>
    countB - countA,
  );

  if (failureEntries.length > 0) {
    lines.push('Failure reasons:');
    for (const [reason, count] of failureEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
