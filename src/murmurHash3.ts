const MASK64 = 0xffffffffffffffffn;
const C1 = 0x87c37b91114253d5n;
const C2 = 0x4cf5ad432745937fn;

/**
 * The two 64-bit words of a MurmurHash3 x64-128 digest.
 */
export interface Hash128 {
  h1: bigint;
  h2: bigint;
}

function rotl64(x: bigint, r: bigint): bigint {
  return ((x << r) | (x >> (64n - r))) & MASK64;
}

function mul64(a: bigint, b: bigint): bigint {
  return (a * b) & MASK64;
}

function fmix64(k: bigint): bigint {
  k ^= k >> 33n;
  k = mul64(k, 0xff51afd7ed558ccdn);
  k ^= k >> 33n;
  k = mul64(k, 0xc4ceb9fe1a85ec53n);
  k ^= k >> 33n;
  return k;
}

function mixK1(k1: bigint): bigint {
  return mul64(rotl64(mul64(k1, C1), 31n), C2);
}

function mixK2(k2: bigint): bigint {
  return mul64(rotl64(mul64(k2, C2), 33n), C1);
}

/**
 * MurmurHash3 x64-128 over a byte array. Both words are unsigned.
 */
export function murmurHash3x64_128(data: Uint8Array, seed: number = 47): Hash128 {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const length = data.length;
  const nblocks = Math.floor(length / 16);
  let h1 = BigInt(seed) & MASK64;
  let h2 = h1;

  for (let i = 0; i < nblocks; i++) {
    const offset = i * 16;
    const k1 = view.getBigUint64(offset, true);
    const k2 = view.getBigUint64(offset + 8, true);

    h1 ^= mixK1(k1);
    h1 = rotl64(h1, 27n);
    h1 = (h1 + h2) & MASK64;
    h1 = (mul64(h1, 5n) + 0x52dce729n) & MASK64;

    h2 ^= mixK2(k2);
    h2 = rotl64(h2, 31n);
    h2 = (h2 + h1) & MASK64;
    h2 = (mul64(h2, 5n) + 0x38495ab5n) & MASK64;
  }

  const tail = nblocks * 16;
  const rest = length & 15;
  let k1 = 0n;
  let k2 = 0n;
  for (let i = rest - 1; i >= 8; i--) {
    k2 ^= BigInt(data[tail + i]) << BigInt(8 * (i - 8));
  }
  if (rest > 8) {
    h2 ^= mixK2(k2);
  }
  for (let i = Math.min(rest, 8) - 1; i >= 0; i--) {
    k1 ^= BigInt(data[tail + i]) << BigInt(8 * i);
  }
  if (rest > 0) {
    h1 ^= mixK1(k1);
  }

  h1 ^= BigInt(length);
  h2 ^= BigInt(length);
  h1 = (h1 + h2) & MASK64;
  h2 = (h2 + h1) & MASK64;
  h1 = fmix64(h1);
  h2 = fmix64(h2);
  h1 = (h1 + h2) & MASK64;
  h2 = (h2 + h1) & MASK64;
  return { h1, h2 };
}
