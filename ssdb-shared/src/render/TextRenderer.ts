/**
 * Terminal renderer: draws the Cα–Cβ–Sγ chain of both cysteines in the
 * requested style. Multi view draws one panel per style.
 */

import type { Disulfide } from '../types/disulfide';
import { RENDER_STYLES, RenderStyle, styleCode, styleLabel } from './styles';
import type { RenderHandle, Renderer, Segment, StyledLine } from './types';

export type AtomElement = 'N' | 'C' | 'S';

interface Atom {
  label: string;
  element: AtomElement;
}

const HALF: Atom[] = [
  { label: 'N', element: 'N' },
  { label: 'CA', element: 'C' },
  { label: 'CB', element: 'C' },
  { label: 'SG', element: 'S' },
];

/** Proximal N→SG, then distal SG→N. */
const CHAIN: Atom[] = [...HALF, ...[...HALF].reverse()];

const PALETTE: Record<'light' | 'dark', Record<AtomElement, string>> = {
  light: { N: 'blue', C: 'gray', S: 'yellow' },
  dark: { N: 'cyan', C: 'white', S: 'yellowBright' },
};

function isDisulfideBond(a: Atom, b: Atom): boolean {
  return a.element === 'S' && b.element === 'S';
}

function chainLine(style: RenderStyle, colors: Readonly<Record<AtomElement, string>>): StyledLine {
  const line: StyledLine = [];
  const code = styleCode(style);
  CHAIN.forEach((atom, i) => {
    const color = colors[atom.element];
    const prev = i > 0 ? CHAIN[i - 1] : null;
    switch (code) {
      case 'sb':
        if (prev) {
          const glyph = isDisulfideBond(prev, atom) ? '═' : '━';
          line.push({ text: glyph, color: colors[prev.element] });
          line.push({ text: glyph, color });
        }
        line.push({ text: atom.label, color, bold: true });
        break;
      case 'cpk':
        line.push({ text: `(${atom.label})`, color, bold: true });
        break;
      case 'bs':
        if (prev) {
          line.push({ text: isDisulfideBond(prev, atom) ? ' ══ ' : ' ── ', color: 'gray' });
        }
        line.push({ text: '●', color });
        line.push({ text: atom.label, color });
        break;
    }
  });
  return line;
}

function visibleWidth(line: StyledLine): number {
  return line.reduce((n, seg) => n + [...seg.text].length, 0);
}

function residueLine(item: Disulfide): StyledLine {
  if (!item.proximal || !item.distal) return [{ text: item.id, bold: true }];
  return [
    { text: item.id, bold: true },
    { text: `  Cys${item.proximal.residue}${item.proximal.chain} – Cys${item.distal.residue}${item.distal.chain}`, dim: true },
  ];
}

function captionLine(item: Disulfide): StyledLine {
  return [
    { text: `Cα–Cα ${item.caDistance.toFixed(2)} Å  Cβ–Cβ ${item.cbDistance.toFixed(2)} Å  τ ${item.torsionLength.toFixed(2)}°`, dim: true },
  ];
}

/** Element colors of the light or dark palette; used for legends. */
export function atomColors(light: boolean): Readonly<Record<AtomElement, string>> {
  return PALETTE[light ? 'light' : 'dark'];
}

export class TextRenderer implements Renderer {
  render(item: Disulfide, style: RenderStyle, single: boolean, shadows: boolean, light: boolean): RenderHandle {
    const colors = atomColors(light);
    const styles = single ? [style] : RENDER_STYLES;
    const lines: StyledLine[] = [residueLine(item)];

    for (const s of styles) {
      const chain = chainLine(s, colors);
      lines.push([]);
      lines.push([{ text: styleLabel(s), bold: true, color: light ? 'magenta' : 'magentaBright' }]);
      lines.push(chain);
      if (shadows) {
        const shadow: Segment = { text: '▔'.repeat(visibleWidth(chain)), dim: true };
        lines.push([shadow]);
      }
    }

    lines.push([]);
    lines.push(captionLine(item));
    return { itemId: item.id, lines, lightMode: light };
  }
}

/** Plain text of a rendered line, without styling. */
export function lineText(line: StyledLine): string {
  return line.map(seg => seg.text).join('');
}
