import type { SlimTrack } from '../schemas/outputs.ts';

const PREVIEW_COUNT = 20;

/** Bullet list of the first items, with a trailing "and N more" note. */
export function bulletList<T>(items: T[], render: (item: T, index: number) => string): string {
  const lines = items.slice(0, PREVIEW_COUNT).map((item, i) => `- ${render(item, i)}`);
  if (items.length > PREVIEW_COUNT) {
    lines.push(`… and ${items.length - PREVIEW_COUNT} more`);
  }
  return lines.join('\n');
}

export function describeTrack(track: SlimTrack): string {
  const by = track.artists.length > 0 ? ` by ${track.artists.join(', ')}` : '';
  return `${track.name}${by}${track.uri ? ` — ${track.uri}` : ''}`;
}
