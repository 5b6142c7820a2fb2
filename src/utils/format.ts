const UNIT = 1024;

export function formatSize(size: number): string {
  if (size < UNIT) {
    return `${size}B`;
  }
  let div = UNIT;
  let exp = 0;
  for (let n = size / UNIT; n >= UNIT; n /= UNIT) {
    div *= UNIT;
    exp++;
  }
  return `${(size / div).toFixed(1)}${'KMGTPE'[exp]}B`;
}
