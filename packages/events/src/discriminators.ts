// Anchor discriminators: sha256("event:<Name>")[..8] for events,
// sha256("global:<ix>")[..8] for instructions, sha256("account:<Type>")[..8] for accounts.

const d = (hex: string): Buffer => Buffer.from(hex, "hex");

/** Prefix of a self-CPI event instruction (emit_cpi); the event discriminator follows it. */
export const EVENT_IX_TAG = d("e445a52e51cb9a1d");

export const PUMPFUN = {
  events: {
    create: d("1b72a94ddeeb6376"),
    trade: d("bddb7fd34ee661ee"),
    complete: d("5f72619cd42e9808"),
  },
  ix: {
    create: d("181ec828051c0777"),
    buy: d("66063d1201daebea"),
    sell: d("33e685a4017f83ad"),
  },
  accounts: {
    bondingCurve: d("17b7f83760d8ac60"),
  },
} as const;

export const PUMPSWAP = {
  events: {
    createPool: d("b1310cd2a076a774"),
    buy: d("67f4521f2cf57777"),
    sell: d("3e2f370aa503dc2a"),
    deposit: d("78f83d531f8e6b90"),
    withdraw: d("1609851aa02c47c0"),
  },
  ix: {
    createPool: d("e992d18ecf6840bc"),
    buy: d("66063d1201daebea"),
    sell: d("33e685a4017f83ad"),
    deposit: d("f223c68952e1f2b6"),
    withdraw: d("b712469c946da122"),
  },
  accounts: {
    pool: d("f19a6d0411b16dbc"),
  },
} as const;

export const BONK = {
  events: {
    poolCreate: d("97d7e20976a173ae"),
    trade: d("bddb7fd34ee661ee"),
  },
  ix: {
    buyExactIn: d("faea0d7bd59c13ec"),
    sellExactIn: d("9527de9bd37c981a"),
  },
  accounts: {
    poolState: d("f7ede3f5d7c3de46"),
  },
} as const;

export function hasPrefix(data: Uint8Array, prefix: Uint8Array): boolean {
  if (data.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) if (data[i] !== prefix[i]) return false;
  return true;
}
