/**
 * Output Formatter
 */

import { DesiredImage, ImagesResponse, OutputFormat, TargetSnapshot } from './types';

export class Formatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = 'table') {
    this.format = format;
  }

  /**
   * Set output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Format target names
   */
  formatTargetList(names: string[]): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(names, null, 2);
      case 'simple':
        return names.join('\n');
      case 'table':
      default:
        if (names.length === 0) {
          return 'No targets found.';
        }
        return this.formatTable(['Name'], names.map((name) => [name]));
    }
  }

  /**
   * Format a single target snapshot
   */
  formatTarget(snapshot: TargetSnapshot): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(snapshot, null, 2);
      case 'simple':
        return [
          snapshot.name,
          `${snapshot.available.length}/${snapshot.desired.length}`,
          snapshot.pulling ?? '-',
        ].join('\t');
      case 'table':
      default:
        return this.formatTargetDetail(snapshot);
    }
  }

  /**
   * Format an images response (available or desired)
   */
  formatImages(response: ImagesResponse): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(response, null, 2);
      case 'simple':
        return response.images.map((image) => `${image.imageURL}\t${image.digest ?? '-'}`).join('\n');
      case 'table':
      default:
        if (response.images.length === 0) {
          return 'No images found.';
        }
        return this.formatTable(['Name', 'Image', 'Digest'], response.images.map(imageRow));
    }
  }

  /**
   * Format as table
   */
  private formatTable(headers: string[], rows: string[][]): string {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => r[i].length))
    );

    const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
    const headerLine = headers.map((h, i) => ` ${h.padEnd(colWidths[i])} `).join('|');

    const lines = rows.map((row) =>
      `|${row.map((cell, i) => ` ${cell.padEnd(colWidths[i])} `).join('|')}|`
    );

    return [separator, `|${headerLine}|`, separator, ...lines, separator].join('\n');
  }

  private formatTargetDetail(snapshot: TargetSnapshot): string {
    const labels = Object.entries(snapshot.labels).map(([key, value]) => `${key}=${value}`);
    const lines = [
      `Name: ${snapshot.name}`,
      `Labels: ${labels.length > 0 ? labels.join(',') : '<all nodes>'}`,
      `Desired: ${snapshot.desired.length} (${snapshot.available.length} available, ${snapshot.missing.length} missing)`,
      `Cached on all nodes: ${snapshot.commonCache.length}`,
      `Pulling: ${snapshot.pulling ?? 'idle'}`,
      `Last checked: ${snapshot.lastCheckedAt ?? 'never'}`,
    ];

    if (snapshot.lastError) {
      lines.push(`Last error: ${snapshot.lastError}`);
    }

    return lines.join('\n');
  }
}

function imageRow(image: DesiredImage): string[] {
  return [image.displayName, image.imageURL, image.digest ? shortDigest(image.digest) : '-'];
}

/** sha256:0123456789abcdef... → sha256:0123456789ab */
export function shortDigest(digest: string): string {
  const [algorithm, hex] = digest.split(':');
  return hex ? `${algorithm}:${hex.substring(0, 12)}` : digest;
}
