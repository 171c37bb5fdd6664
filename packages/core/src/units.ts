export type Brand<T, B extends string> = T & { readonly __brand: B };

export type USD = Brand<number, "USD">;
export type KgCO2e = Brand<number, "KgCO2e">;
export type Tonnes = Brand<number, "Tonnes">;

export const usd = (value: number): USD => value as USD;
export const kgCO2e = (value: number): KgCO2e => value as KgCO2e;
export const tonnes = (value: number): Tonnes => value as Tonnes;

export const toNumber = (value: number): number => value;

export const sum = <T>(items: readonly T[], selector: (item: T) => number): number =>
  items.reduce((total, item) => total + selector(item), 0);
