/**
 * Renders lyrics as an SVG image, with the cover embedded when available.
 * Only channels that display SVG should declare the `image` tag.
 */

import type { LyricsLine, LyricsRenderer } from '@tunedrop/core';

export interface SvgLyricsRendererOptions {
  width?: number;
  fontSize?: number;
  lineHeight?: number;
  padding?: number;
  coverSize?: number;
  background?: string;
  foreground?: string;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Image mime type from magic bytes */
export function sniffImageType(data: Buffer): string | null {
  if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'image/png';
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (data.length >= 12 && data.toString('ascii', 0, 4) === 'RIFF' && data.toString('ascii', 8, 12) === 'WEBP') {
    return 'image/webp';
  }
  if (data.length >= 6 && data.toString('ascii', 0, 3) === 'GIF') {
    return 'image/gif';
  }
  return null;
}

export class SvgLyricsRenderer implements LyricsRenderer {
  private width: number;
  private fontSize: number;
  private lineHeight: number;
  private padding: number;
  private coverSize: number;
  private background: string;
  private foreground: string;

  constructor(options: SvgLyricsRendererOptions = {}) {
    this.width = options.width ?? 640;
    this.fontSize = options.fontSize ?? 22;
    this.lineHeight = options.lineHeight ?? 36;
    this.padding = options.padding ?? 40;
    this.coverSize = options.coverSize ?? 160;
    this.background = options.background ?? '#fdf6e3';
    this.foreground = options.foreground ?? '#3b3a36';
  }

  render(lyrics: LyricsLine[], options: { title?: string; cover?: Buffer } = {}): { data: Buffer; mime: string } {
    const parts: string[] = [];
    const center = this.width / 2;
    let y = this.padding;

    const coverType = options.cover ? sniffImageType(options.cover) : null;
    if (options.cover && coverType) {
      const x = center - this.coverSize / 2;
      const href = `data:${coverType};base64,${options.cover.toString('base64')}`;
      parts.push(`<image x="${x}" y="${y}" width="${this.coverSize}" height="${this.coverSize}" href="${href}"/>`);
      y += this.coverSize + this.padding / 2;
    }

    if (options.title) {
      y += this.lineHeight;
      parts.push(
        `<text x="${center}" y="${y}" font-size="${Math.round(this.fontSize * 1.2)}" font-weight="bold">${escapeXml(options.title)}</text>`
      );
      y += this.lineHeight / 2;
    }

    for (const line of lyrics) {
      y += this.lineHeight;
      parts.push(`<text x="${center}" y="${y}">${escapeXml(line.text)}</text>`);
    }

    const height = y + this.padding;
    const svg = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${height}" viewBox="0 0 ${this.width} ${height}">`,
      `<rect width="100%" height="100%" fill="${this.background}"/>`,
      `<g fill="${this.foreground}" font-family="sans-serif" font-size="${this.fontSize}" text-anchor="middle">`,
      ...parts,
      '</g>',
      '</svg>'
    ].join('\n');

    return { data: Buffer.from(svg, 'utf-8'), mime: 'image/svg+xml' };
  }
}
