const SIZE_PATTERN = /(\d+)\s*m²/u;
// \d+ "+" word, where word matches letters of any script ("2+kk", "3+1", "1+ložnice")
const LAYOUT_PATTERN = /\d+\+[\p{L}\p{N}_]+/u;

const PRAGUE_KEYWORDS = ['Praha', 'Prague', 'Praze'];
const GARAGE_KEYWORDS = ['garage', 'Garáž', 'Parkování', 'parking_lots'].map((k) => k.toLowerCase());

export interface SizeAndLayout {
  sizeSqm: number | null;
  roomLayout: string | null;
}

export function extractSizeAndLayout(title: string): SizeAndLayout {
  const sizeMatch = SIZE_PATTERN.exec(title);
  const layoutMatch = LAYOUT_PATTERN.exec(title);

  return {
    sizeSqm: sizeMatch ? Number.parseInt(sizeMatch[1], 10) : null,
    roomLayout: layoutMatch ? layoutMatch[0] : null
  };
}

/** Case-sensitive substring test: "Praha 5" and "Praze 10" match, "praha" does not. */
export function isPragueLocality(locality: string): boolean {
  return PRAGUE_KEYWORDS.some((keyword) => locality.includes(keyword));
}

function mentionsGarage(label: string): boolean {
  const lowered = label.toLowerCase();
  return GARAGE_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

export function hasGarage(labels: readonly string[], labelsAll: readonly (readonly string[])[]): boolean {
  if (labels.some(mentionsGarage)) return true;
  return labelsAll.some((group) => group.some(mentionsGarage));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function extractImages(links: Record<string, unknown>): string[] {
  const images = links.images;
  if (!Array.isArray(images)) return [];

  const urls: string[] = [];
  for (const image of images) {
    if (isRecord(image) && typeof image.href === 'string') {
      urls.push(image.href);
    }
  }
  return urls;
}
