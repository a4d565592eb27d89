/**
 * Visualization vocabulary: closed unions for what is drawn, where, and in
 * which palette, plus the text parsers that are the only way in from the CLI.
 */
import { EncodeError } from '../utils/errors.js';

// ── Type ──────────────────────────────────────────────────────────────────────

export const VISUALIZATION_TYPES = ['waveform', 'spectrum', 'both'] as const;

export type VisualizationType = typeof VISUALIZATION_TYPES[number];

const TYPE_ALIASES: Record<string, VisualizationType> = {
  wave:     'waveform',
  waveform: 'waveform',
  spectrum: 'spectrum',
  spec:     'spectrum',
  both:     'both',
};

export function parseVisualizationType(raw: string): VisualizationType {
  const type = TYPE_ALIASES[raw.trim().toLowerCase()];
  if (!type) {
    throw new EncodeError(
      'ConfigurationError',
      `Unknown visualization type: ${raw}. Use 'wave', 'spectrum', or 'both'.`,
    );
  }
  return type;
}

// ── Color scheme ──────────────────────────────────────────────────────────────

export const SPECTRUM_COLOR_SCHEMES = [
  'rainbow',
  'moreland',
  'nebulae',
  'fire',
  'fiery',
  'fruit',
  'cool',
  'magma',
  'green',
  'viridis',
  'plasma',
  'cividis',
  'terrain',
] as const;

export type SpectrumColorScheme = typeof SPECTRUM_COLOR_SCHEMES[number];

function isColorScheme(value: string): value is SpectrumColorScheme {
  return (SPECTRUM_COLOR_SCHEMES as readonly string[]).includes(value);
}

export function parseColorScheme(raw: string): SpectrumColorScheme {
  const normalized = raw.trim().toLowerCase();
  if (!isColorScheme(normalized)) {
    const names = SPECTRUM_COLOR_SCHEMES.map((s) => `'${s}'`).join(', ');
    throw new EncodeError('ConfigurationError', `Unknown color scheme: ${raw}. Use ${names}`);
  }
  return normalized;
}

// ── Position ──────────────────────────────────────────────────────────────────

export type AnchoredPosition = 'top' | 'bottom' | 'left' | 'right' | 'center';

export type VisualizationPosition =
  | { kind: AnchoredPosition }
  | { kind: 'custom'; x: number; y: number };

const ANCHORS: readonly AnchoredPosition[] = ['top', 'bottom', 'left', 'right', 'center'];

const CUSTOM_POSITION = /^xy\(\s*([^,()]*?)\s*,\s*([^,()]*?)\s*\)$/i;

function parseCoordinate(raw: string, axis: 'x' | 'y'): number {
  if (!/^\d+$/.test(raw)) {
    throw new EncodeError('ConfigurationError', `Invalid ${axis} coordinate: ${raw}`);
  }
  return Number(raw);
}

export function parsePosition(raw: string): VisualizationPosition {
  const normalized = raw.trim().toLowerCase();
  const anchor = ANCHORS.find((a) => a === normalized);
  if (anchor) return { kind: anchor };

  if (normalized.startsWith('xy(')) {
    const match = CUSTOM_POSITION.exec(raw.trim());
    if (!match) {
      throw new EncodeError('ConfigurationError', "Invalid position format. Use 'xy(x,y)'");
    }
    return {
      kind: 'custom',
      x: parseCoordinate(match[1] ?? '', 'x'),
      y: parseCoordinate(match[2] ?? '', 'y'),
    };
  }

  throw new EncodeError(
    'ConfigurationError',
    `Unknown position: ${raw}. Use 'top', 'bottom', 'left', 'right', 'center', or 'xy(x,y)'`,
  );
}

export function formatPosition(position: VisualizationPosition): string {
  return position.kind === 'custom' ? `xy(${position.x},${position.y})` : position.kind;
}

// ── Request ───────────────────────────────────────────────────────────────────

export interface VisualizationRequest {
  readonly type: VisualizationType;
  readonly position: VisualizationPosition;
  readonly colorScheme: SpectrumColorScheme;
  /** Pixel size of the visualization strip; both must be > 0. */
  readonly width: number;
  readonly height: number;
  /** Distance from the anchored edge; may be 0. */
  readonly margin: number;
}
