import sharp from "sharp";
import { calculateRounds, isValidBracketSize } from "./bracketGenerator.js";
import type { BracketSlot } from "./bracketProjection.js";
import { RenderFailureError, UnsupportedBracketSizeError } from "./errors.js";

export const IMAGE_WIDTH = 1800;
export const MIN_IMAGE_HEIGHT = 900;
const MARGIN_X = 130;
const MARGIN_Y = 80;
const BOX_HEIGHT = 46;
/** Vertical room per first-round box once the bracket outgrows the default height */
const ROW_PITCH = 58;
const BOX_RADIUS = 18;
const CHAMPION_RADIUS = 20;
const CHAMPION_TAIL = 60;
const X_PAD = 4;
const FONT_SIZE = 22;
/** Rough advance width of a 22px Arial glyph, used to cut long names */
const CHAR_WIDTH = 12;

const COLORS = {
  pink: "#ff0078",
  gold: "#ffcc78",
  white: "#f0f0f0",
  background: "#050508",
  edge: "#000000",
} as const;

export interface BoxRect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface BracketLayout {
  width: number;
  height: number;
  numRounds: number;
  colStep: number;
  boxWidth: number;
  /** rounds[r][i]: box i of column r, r < numRounds */
  rounds: BoxRect[][];
  champion: BoxRect;
  championY: number;
}

export interface BracketImageInput {
  seeds: readonly string[];
  eliminatedSlots: readonly BracketSlot[];
  /** Per-column occupants as in the projection; only seeds are shown without it */
  columns?: readonly (readonly (string | null)[])[];
}

function centerY(box: BoxRect): number {
  return (box.top + box.bottom) / 2;
}

/**
 * Box geometry for an N-team bracket: one column per round plus the
 * champion box, boxes spread evenly over the vertical span.
 */
export function computeBracketLayout(teamCount: number): BracketLayout {
  if (!isValidBracketSize(teamCount)) {
    throw new UnsupportedBracketSizeError(teamCount);
  }

  const numRounds = calculateRounds(teamCount);
  const height = Math.max(
    MIN_IMAGE_HEIGHT,
    teamCount * ROW_PITCH + 2 * MARGIN_Y,
  );
  const totalSpan = height - 2 * MARGIN_Y;
  const colStep = (IMAGE_WIDTH - 2 * MARGIN_X) / (numRounds + 1);
  const boxWidth = colStep * 0.75;

  const rounds: BoxRect[][] = [];
  for (let r = 0, count = teamCount; r < numRounds; r++, count /= 2) {
    const colX = MARGIN_X + r * colStep;
    const gap = totalSpan / count;
    const boxes: BoxRect[] = [];
    for (let i = 0; i < count; i++) {
      const cy = MARGIN_Y + gap * (i + 0.5);
      boxes.push({
        left: Math.trunc(colX),
        top: Math.trunc(cy - BOX_HEIGHT / 2),
        right: Math.trunc(colX + boxWidth),
        bottom: Math.trunc(cy + BOX_HEIGHT / 2),
      });
    }
    rounds.push(boxes);
  }

  const lastRound = rounds[rounds.length - 1] ?? [];
  const first = lastRound[0];
  const last = lastRound[lastRound.length - 1];
  const championY =
    first && last
      ? Math.trunc((centerY(first) + centerY(last)) / 2)
      : Math.trunc(height / 2);

  const championX = MARGIN_X + numRounds * colStep;
  const champion: BoxRect = {
    left: Math.trunc(championX),
    top: Math.trunc(championY - BOX_HEIGHT / 2),
    right: Math.trunc(championX + boxWidth * 1.2),
    bottom: Math.trunc(championY + BOX_HEIGHT / 2),
  };

  return {
    width: IMAGE_WIDTH,
    height,
    numRounds,
    colStep,
    boxWidth,
    rounds,
    champion,
    championY,
  };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Cut a label to what fits in `maxWidth` pixels, ending with an ellipsis */
export function fitLabel(text: string, maxWidth: number): string {
  const chars = Array.from(text);
  const maxChars = Math.max(1, Math.floor(maxWidth / CHAR_WIDTH));
  if (chars.length <= maxChars) return text;
  return `${chars.slice(0, maxChars - 1).join("")}…`;
}

function num(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function line(x1: number, y1: number, x2: number, y2: number): string {
  return `<line x1="${num(x1)}" y1="${num(y1)}" x2="${num(x2)}" y2="${num(y2)}"/>`;
}

function rect(box: BoxRect, radius: number): string {
  return `<rect x="${box.left}" y="${box.top}" width="${box.right - box.left}" height="${box.bottom - box.top}" rx="${radius}"/>`;
}

function text(x: number, y: number, label: string): string {
  return `<text x="${x}" y="${y}">${escapeXml(label)}</text>`;
}

function labelFor(
  input: BracketImageInput,
  round: number,
  slot: number,
): string | null {
  const fromColumns = input.columns?.[round]?.[slot];
  if (fromColumns) return fromColumns;
  if (round === 0) return input.seeds[slot] ?? null;
  return null;
}

function connectorLines(layout: BracketLayout): string[] {
  const lines: string[] = [];

  for (let r = 0; r + 1 < layout.rounds.length; r++) {
    const children = layout.rounds[r] ?? [];
    const parents = layout.rounds[r + 1] ?? [];
    parents.forEach((parent, j) => {
      const top = children[2 * j];
      const bottom = children[2 * j + 1];
      if (!top || !bottom) return;
      const midX = (top.right + parent.left) / 2;
      lines.push(
        line(top.right, centerY(top), midX, centerY(top)),
        line(bottom.right, centerY(bottom), midX, centerY(bottom)),
        line(midX, centerY(top), midX, centerY(bottom)),
        line(midX, centerY(parent), parent.left, centerY(parent)),
      );
    });
  }

  const lastRound = layout.rounds[layout.rounds.length - 1] ?? [];
  const finalTop = lastRound[0];
  const finalBottom = lastRound[1];
  const { champion, championY } = layout;
  if (finalTop && finalBottom) {
    const midX = (finalTop.right + champion.left) / 2;
    lines.push(
      line(finalTop.right, centerY(finalTop), midX, centerY(finalTop)),
      line(finalBottom.right, centerY(finalBottom), midX, centerY(finalBottom)),
      line(midX, centerY(finalTop), midX, centerY(finalBottom)),
      line(midX, championY, champion.left, championY),
    );
  } else if (finalTop) {
    const midX = (finalTop.right + champion.left) / 2;
    lines.push(
      line(finalTop.right, centerY(finalTop), midX, centerY(finalTop)),
      line(midX, championY, champion.left, championY),
    );
  }

  return lines;
}

/**
 * SVG document for the bracket. Pure: equal inputs give equal strings.
 */
export function buildBracketSvg(input: BracketImageInput): string {
  const layout = computeBracketLayout(input.seeds.length);
  const { width, height, champion } = layout;
  const labelWidth = layout.boxWidth - 20;

  const boxes: string[] = [];
  const labels: string[] = [];
  layout.rounds.forEach((round, r) => {
    round.forEach((box, i) => {
      boxes.push(rect(box, BOX_RADIUS));
      const label = labelFor(input, r, i);
      if (label) {
        labels.push(text(box.left + 10, box.top + 30, fitLabel(label, labelWidth)));
      }
    });
  });

  const championName = input.columns?.[layout.numRounds]?.[0] ?? null;
  const championLabel = championName ? `Champion: ${championName}` : "Champion";
  const championCy = centerY(champion);

  const crosses: string[] = [];
  for (const { round, slot } of input.eliminatedSlots) {
    const box = layout.rounds[round]?.[slot];
    if (!box) continue;
    crosses.push(
      line(box.left + X_PAD, box.top + X_PAD, box.right - X_PAD, box.bottom - X_PAD),
      line(box.left + X_PAD, box.bottom - X_PAD, box.right - X_PAD, box.top + X_PAD),
    );
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<defs><radialGradient id="bg" cx="50%" cy="50%" r="70%">`,
    `<stop offset="0" stop-color="${COLORS.background}"/>`,
    `<stop offset="1" stop-color="${COLORS.edge}"/>`,
    `</radialGradient></defs>`,
    `<rect width="${width}" height="${height}" fill="url(#bg)"/>`,
    `<g class="boxes" fill="none" stroke="${COLORS.pink}" stroke-width="3">`,
    ...boxes,
    `</g>`,
    `<g class="champion" fill="none" stroke="${COLORS.gold}" stroke-width="3">`,
    rect(champion, CHAMPION_RADIUS),
    line(champion.right, championCy, champion.right + CHAMPION_TAIL, championCy),
    `</g>`,
    `<g class="connectors" stroke="${COLORS.pink}" stroke-width="3">`,
    ...connectorLines(layout),
    `</g>`,
    `<g class="labels" fill="${COLORS.white}" font-family="Arial, Helvetica, sans-serif" font-size="${FONT_SIZE}">`,
    ...labels,
    text(
      champion.left + 22,
      champion.top + 30,
      fitLabel(championLabel, champion.right - champion.left - 44),
    ),
    `</g>`,
    `<g class="eliminated" stroke="${COLORS.pink}" stroke-width="3">`,
    ...crosses,
    `</g>`,
    `</svg>`,
  ].join("\n");
}

/**
 * Render the bracket to PNG bytes
 */
export async function renderBracket(input: BracketImageInput): Promise<Buffer> {
  const svg = buildBracketSvg(input);
  try {
    return await sharp(Buffer.from(svg)).png().toBuffer();
  } catch (error) {
    throw new RenderFailureError(error);
  }
}
