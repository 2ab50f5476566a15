const DAY_MS = 24 * 60 * 60 * 1000;

export const groupBy = <T, K extends PropertyKey>(items: T[], key: (item: T) => K): Map<K, T[]> => items.reduce(
    (result, item) => result.set(key(item), [...(result.get(key(item)) || []), item]),
    new Map<K, T[]>(),
);

export const addDays = (date: Date, days: number) => new Date(date.getTime() + days * DAY_MS);

export const addHours = (date: Date, hours: number) => new Date(date.getTime() + hours * 60 * 60 * 1000);

/** Whole days `date` is past `due`, counting a started day as a full one. */
export const daysLate = (due: Date, date: Date) => Math.max(0, Math.ceil((date.getTime() - due.getTime()) / DAY_MS));

// plain record of the defined fields, as the ORM wants for values and where clauses
export const toPlain = (values: object): Record<string, unknown> =>
    Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
