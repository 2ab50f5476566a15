import { BaseDataConnector, EntityType, EntityDataMap, EntityFilter, IEntityData, StoredEntity } from "./base-data-connector";
import { ApiError, apiErrors } from "./errors";
import { toPlain } from "./utils";

type Tables = {[E in EntityType]: StoredEntity<E>[]};

const emptyTables = (): Tables => ({
    [EntityType.USERS]: [],
    [EntityType.BOOKS]: [],
    [EntityType.LOANS]: [],
    [EntityType.RESERVATIONS]: [],
});

const matches = <T>(row: T, filter: EntityFilter<T>): boolean => {
    for (const key in filter) {
        const expected = filter[key];
        if (expected === undefined) {
            continue;
        }
        if (Array.isArray(expected) ? !expected.includes(row[key]) : expected !== row[key]) {
            return false;
        }
    }
    return true;
}

interface IStore {
    tables: Tables;
    lastIds: {[E in EntityType]: number};
}

const emptyStore = (): IStore => ({
    tables: emptyTables(),
    lastIds: {
        [EntityType.USERS]: 0,
        [EntityType.BOOKS]: 0,
        [EntityType.LOANS]: 0,
        [EntityType.RESERVATIONS]: 0,
    },
});

export class InMemoryDataConnector extends BaseDataConnector {
    private store: IStore;
    // set on the view handed to an atomic unit
    private inUnit: boolean;
    constructor(store: IStore = emptyStore(), inUnit = false) {
        super();
        this.store = store;
        this.inUnit = inUnit;
    }

    public async init(): Promise<void> {
        return;
    }
    public async close(): Promise<void> {
        this.store.tables = emptyTables();
    }
    public async insert<E extends EntityType>(entity: E, data: EntityDataMap[E]): Promise<StoredEntity<E>> {
        return this.write(() => {
            this.store.lastIds[entity] += 1;
            const row = {...data, id: this.store.lastIds[entity]};
            this.store.tables[entity].push(row);
            return {...row};
        });
    }
    public async get<E extends EntityType>(entity: E, id: number): Promise<StoredEntity<E> | undefined> {
        const row = this.store.tables[entity].find((e) => e.id === id);
        return row && {...row};
    }
    public async getAll<E extends EntityType>(entity: E, filter?: EntityFilter<StoredEntity<E>>): Promise<StoredEntity<E>[]> {
        const rows = this.store.tables[entity];
        return (filter ? rows.filter((row) => matches(row, filter)) : rows).map((row) => ({...row}));
    }
    public async update<E extends EntityType>(entity: E, id: number, newData: Partial<EntityDataMap[E]>): Promise<StoredEntity<E>> {
        return this.write(() => {
            const rows = this.store.tables[entity];
            const rowIndex = rows.findIndex((e) => e.id === id);
            if (rowIndex < 0) {
                throw ApiError.fromCode(apiErrors.NotFound, [entity, id.toString()]);
            }
            // undefined fields are left as they are
            rows[rowIndex] = Object.assign({...rows[rowIndex]}, toPlain(newData), {id});
            return {...rows[rowIndex]};
        });
    }
    public async remove(entity: EntityType, id: number): Promise<void> {
        return this.write(() => {
            const rows: IEntityData[] = this.store.tables[entity];
            const rowIndex = rows.findIndex((e) => e.id === id);
            if (rowIndex >= 0) {
                rows.splice(rowIndex, 1);
            }
        });
    }
    public async atomic<T>(work: (connector: BaseDataConnector) => Promise<T>): Promise<T> {
        return this.serialize(async () => {
            const snapshot = this.snapshot();
            try {
                return await work(new InMemoryDataConnector(this.store, true));
            } catch (error) {
                // roll back every write the unit made
                this.store.tables = snapshot;
                throw error;
            }
        });
    }
    /** Writes from outside a unit wait for the running unit, so its rollback never discards them. */
    private write<T>(change: () => T): Promise<T> {
        return this.inUnit ? Promise.resolve().then(change) : this.serialize(async () => change());
    }
    private snapshot(): Tables {
        const {tables} = this.store;
        return {
            [EntityType.USERS]: tables[EntityType.USERS].map((row) => ({...row})),
            [EntityType.BOOKS]: tables[EntityType.BOOKS].map((row) => ({...row})),
            [EntityType.LOANS]: tables[EntityType.LOANS].map((row) => ({...row})),
            [EntityType.RESERVATIONS]: tables[EntityType.RESERVATIONS].map((row) => ({...row})),
        };
    }
}
