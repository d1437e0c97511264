export function chunk<T>(input: readonly T[], size: number): T[][] {
  const sizeOrOne = Math.max(1, size);
  const out: T[][] = [];
  for (let i = 0; i < input.length; i += sizeOrOne) {
    out.push([...input.slice(i, i + sizeOrOne)]);
  }
  return out;
}
