/**
 * 配列を指定サイズのチャンクに分割
 *
 * 元の順序を保ったまま、末尾のチャンクだけが size 未満になりうる
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer: ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
