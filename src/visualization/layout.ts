/**
 * Layout synthesis: turns a VisualizationRequest into the ffmpeg
 * -filter_complex string that letterboxes the background and composites the
 * waveform and/or spectrum over it.
 *
 * Input 0 is the background image, input 1 the audio. Overlay placement is
 * written in the overlay filter's own expression language (W/H for the
 * canvas, w/h for the element) so it stays valid whatever the element size.
 * Everything here is pure.
 */
import { CANVAS, SPECTRUM_ANALYSIS, WAVEFORM_STYLE } from '../config.js';
import type {
  SpectrumColorScheme,
  VisualizationPosition,
  VisualizationRequest,
} from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type Orientation = 'horizontal' | 'vertical';

export interface SpectrumParams {
  width: number;
  height: number;
  orientation: Orientation;
}

export interface PaneGeometry {
  width: number;
  height: number;
  /** overlay filter arguments, e.g. `x=(W-w)/2:y=H-h-50` */
  overlay: string;
}

export interface SpectrumPane extends PaneGeometry {
  orientation: Orientation;
}

export interface FilterGraphSpec {
  filterComplex: string;
  waveform: PaneGeometry | null;
  spectrum: SpectrumPane | null;
}

// ── Geometry ──────────────────────────────────────────────────────────────────

/** Left/right placements draw the spectrum on its side, so its axes swap. */
export function getSpectrumParams(
  position: VisualizationPosition,
  width: number,
  height: number,
): SpectrumParams {
  if (position.kind === 'left' || position.kind === 'right') {
    return { width: height, height: width, orientation: 'vertical' };
  }
  return { width, height, orientation: 'horizontal' };
}

export function getPositionOverlay(position: VisualizationPosition, margin: number): string {
  switch (position.kind) {
    case 'top':    return `x=(W-w)/2:y=${margin}`;
    case 'bottom': return `x=(W-w)/2:y=H-h-${margin}`;
    case 'left':   return `x=${margin}:y=(H-h)/2`;
    case 'right':  return `x=W-w-${margin}:y=(H-h)/2`;
    case 'center': return 'x=(W-w)/2:y=(H-h)/2';
    case 'custom': return `x=${position.x}:y=${position.y}`;
  }
}

/**
 * Overlay expressions for the waveform/spectrum pair. `pane` is the thickness
 * of each pane across the stacking axis and `gap` the space between them.
 */
export function getPairedOverlays(
  position: VisualizationPosition,
  margin: number,
  pane: number,
  gap: number,
): { waveform: string; spectrum: string } {
  switch (position.kind) {
    case 'bottom':
      return {
        waveform: `x=(W-w)/2:y=H-h-${pane + gap}-${margin}`,
        spectrum: `x=(W-w)/2:y=H-h-${margin}`,
      };
    case 'top':
      return {
        waveform: `x=(W-w)/2:y=${margin}`,
        spectrum: `x=(W-w)/2:y=${margin + pane + gap}`,
      };
    case 'left':
      return {
        waveform: `x=${margin}:y=(H-h)/2`,
        spectrum: `x=${margin + pane + gap}:y=(H-h)/2`,
      };
    case 'right':
      return {
        waveform: `x=W-w-${pane + gap}-${margin}:y=(H-h)/2`,
        spectrum: `x=W-w-${margin}:y=(H-h)/2`,
      };
    case 'center': {
      const half = Math.floor(gap / 2);
      return {
        waveform: `x=(W-w)/2:y=H/2-h-${half}`,
        spectrum: `x=(W-w)/2:y=H/2+${half}`,
      };
    }
    case 'custom':
      return {
        waveform: `x=${position.x}:y=${position.y}`,
        spectrum: `x=${position.x}:y=${position.y + pane + gap}`,
      };
  }
}

// ── Filter fragments ──────────────────────────────────────────────────────────

export function backgroundFilter(): string {
  const { width, height } = CANVAS;
  return `[0:v]scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2[bg]`;
}

export function waveformArgs(width: number, height: number): string {
  return `showwaves=s=${width}x${height}:mode=${WAVEFORM_STYLE.mode}` +
    `:rate=${WAVEFORM_STYLE.rate}:colors=${WAVEFORM_STYLE.color}`;
}

export function spectrumArgs(params: SpectrumParams, colorScheme: SpectrumColorScheme): string {
  const a = SPECTRUM_ANALYSIS;
  return `showspectrum=s=${params.width}x${params.height}:mode=${a.mode}:scale=${a.scale}` +
    `:slide=${a.slide}:fscale=${a.fscale}:win_func=${a.winFunc}:overlap=${a.overlap}` +
    `:fps=${a.fps}:start=${a.startHz}:stop=${a.stopHz}` +
    `:orientation=${params.orientation === 'vertical' ? 1 : 0}:color=${colorScheme}`;
}

const MONO_AUDIO = '[1:a]aformat=channel_layouts=mono';

// ── Synthesis ─────────────────────────────────────────────────────────────────

export function synthesize(req: VisualizationRequest): FilterGraphSpec {
  switch (req.type) {
    case 'waveform': {
      const overlay = getPositionOverlay(req.position, req.margin);
      return {
        filterComplex: [
          backgroundFilter(),
          `${MONO_AUDIO},${waveformArgs(req.width, req.height)}[wave]`,
          `[bg][wave]overlay=${overlay}`,
        ].join(';'),
        waveform: { width: req.width, height: req.height, overlay },
        spectrum: null,
      };
    }

    case 'spectrum': {
      const params = getSpectrumParams(req.position, req.width, req.height);
      const overlay = getPositionOverlay(req.position, req.margin);
      return {
        filterComplex: [
          backgroundFilter(),
          `${MONO_AUDIO},${spectrumArgs(params, req.colorScheme)}[spec]`,
          `[bg][spec]overlay=${overlay}`,
        ].join(';'),
        waveform: null,
        spectrum: { ...params, overlay },
      };
    }

    case 'both': {
      const gap = Math.floor(req.margin / 2);
      // Side placements split the width between the panes, the rest split the height
      const sideways = req.position.kind === 'left' || req.position.kind === 'right';
      const pane = Math.floor((sideways ? req.width : req.height) / 2);
      const params = getSpectrumParams(req.position, req.width, pane);
      // The waveform pane shares the spectrum pane's on-screen footprint.
      const waveSize = { width: params.width, height: params.height };
      const overlays = getPairedOverlays(req.position, req.margin, pane, gap);
      return {
        filterComplex: [
          backgroundFilter(),
          `${MONO_AUDIO},asplit=2[wa][sa]`,
          `[wa]${waveformArgs(waveSize.width, waveSize.height)}[wave]`,
          `[sa]${spectrumArgs(params, req.colorScheme)}[spec]`,
          `[bg][wave]overlay=${overlays.waveform}[tmp]`,
          `[tmp][spec]overlay=${overlays.spectrum}`,
        ].join(';'),
        waveform: { ...waveSize, overlay: overlays.waveform },
        spectrum: { ...params, overlay: overlays.spectrum },
      };
    }
  }
}
