import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import type { PillarScore } from '../common/types/scoring';
import type { ChartCapability } from './chart-capability';

export interface RadarPoint {
  x: number;
  y: number;
}

export interface RadarSpoke {
  label: string;
  /** Radians clockwise from 12 o'clock. */
  angle: number;
  end: RadarPoint;
}

export interface RadarGeometry {
  size: number;
  center: RadarPoint;
  radius: number;
  spokes: RadarSpoke[];
  rings: { value: number; radius: number }[];
  /** Closed: the first vertex is repeated at the end. */
  polygon: RadarPoint[];
}

const SIZE = 480;
const RADIUS = 170;
const SCALE_MAX = 100;
const GRID_VALUES = [20, 40, 60, 80, 100];
const STROKE = '#1F4E79';

@Injectable()
export class RadarService implements ChartCapability {
  private readonly logger = new Logger(RadarService.name);

  constructor(private readonly config: ConfigService) {}

  isAvailable(): boolean {
    return this.config.get<string>('RADAR_CHART_ENABLED', 'true').toLowerCase() !== 'false';
  }

  async renderRadar(pillarScores: readonly PillarScore[]): Promise<Buffer | null> {
    const svg = this.toSvg(this.buildRadar(pillarScores));
    try {
      return await sharp(Buffer.from(svg)).png().toBuffer();
    } catch (err) {
      this.logger.warn(`Radar chart omitted: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  buildRadar(pillarScores: readonly PillarScore[]): RadarGeometry {
    const center = { x: SIZE / 2, y: SIZE / 2 };
    const step = pillarScores.length ? (2 * Math.PI) / pillarScores.length : 0;

    const spokes = pillarScores.map((p, i) => ({
      label: this.shortLabel(p.pillar),
      angle: i * step,
      end: this.pointAt(center, i * step, RADIUS),
    }));

    const vertices = pillarScores.map((p, i) => {
      const value = Math.min(Math.max(p.score, 0), SCALE_MAX);
      return this.pointAt(center, i * step, (value / SCALE_MAX) * RADIUS);
    });

    return {
      size: SIZE,
      center,
      radius: RADIUS,
      spokes,
      rings: GRID_VALUES.map((value) => ({ value, radius: (value / SCALE_MAX) * RADIUS })),
      polygon: vertices.length ? [...vertices, vertices[0]] : [],
    };
  }

  toSvg(geometry: RadarGeometry): string {
    const { size, center, spokes, rings, polygon } = geometry;
    const fmt = (n: number) => n.toFixed(2);

    const ringEls = rings.map(
      (r) =>
        `<circle cx="${fmt(center.x)}" cy="${fmt(center.y)}" r="${fmt(r.radius)}" fill="none" stroke="#CCCCCC" stroke-width="1"/>` +
        `<text x="${fmt(center.x + 3)}" y="${fmt(center.y - r.radius - 2)}" font-size="10" fill="#888888">${r.value}</text>`,
    );

    const spokeEls = spokes.map((s) => {
      const anchor = this.pointAt(center, s.angle, geometry.radius + 18);
      const dx = anchor.x - center.x;
      const textAnchor = Math.abs(dx) < 1 ? 'middle' : dx > 0 ? 'start' : 'end';
      return (
        `<line x1="${fmt(center.x)}" y1="${fmt(center.y)}" x2="${fmt(s.end.x)}" y2="${fmt(s.end.y)}" stroke="#CCCCCC" stroke-width="1"/>` +
        `<text x="${fmt(anchor.x)}" y="${fmt(anchor.y)}" font-size="12" text-anchor="${textAnchor}" dominant-baseline="middle">${escapeXml(s.label)}</text>`
      );
    });

    const points = polygon.map((p) => `${fmt(p.x)},${fmt(p.y)}`).join(' ');

    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}" font-family="Arial, sans-serif">`,
      `<rect width="${size}" height="${size}" fill="#FFFFFF"/>`,
      ...ringEls,
      ...spokeEls,
      `<polygon points="${points}" fill="${STROKE}" fill-opacity="0.1" stroke="${STROKE}" stroke-width="2"/>`,
      '</svg>',
    ].join('\n');
  }

  /** "A. Channel Strategy & Alignment" -> "Channel Strategy & Alignment" */
  private shortLabel(name: string): string {
    const idx = name.indexOf('. ');
    return idx >= 0 ? name.slice(idx + 2) : name;
  }

  private pointAt(center: RadarPoint, angle: number, r: number): RadarPoint {
    return { x: center.x + r * Math.sin(angle), y: center.y - r * Math.cos(angle) };
  }
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
