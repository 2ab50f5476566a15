import { Model, ModelStatic, Sequelize, Transaction } from "sequelize";
import { BaseDataConnector, EntityType, EntityDataMap, EntityFilter, StoredEntity } from "../base-data-connector";
import { ApiError, apiErrors } from "../errors";
import { logger } from "../logger";
import { toPlain } from "../utils";
import { createConnection } from "./connection";
import { defineBook } from "./models/book";
import { defineLoan } from "./models/loan";
import { defineReservation } from "./models/reservation";
import { defineUser } from "./models/user";

type EntityModelMap = {[E in EntityType]: ModelStatic<Model>};

const modelsByConnection = new WeakMap<Sequelize, EntityModelMap>();

const getEntityModelMap = (sequelize: Sequelize): EntityModelMap => {
    let models = modelsByConnection.get(sequelize);
    if (!models) {
        models = {
            [EntityType.USERS]: defineUser(sequelize),
            [EntityType.BOOKS]: defineBook(sequelize),
            [EntityType.LOANS]: defineLoan(sequelize),
            [EntityType.RESERVATIONS]: defineReservation(sequelize),
        };
        modelsByConnection.set(sequelize, models);
    }
    return models;
}

export class SequelizeDataConnector extends BaseDataConnector {
    private sequelize: Sequelize;
    private transaction?: Transaction;
    private entityModelMap: EntityModelMap;
    constructor(sequelize: Sequelize = createConnection(), transaction?: Transaction) {
        super();
        this.sequelize = sequelize;
        this.transaction = transaction;
        this.entityModelMap = getEntityModelMap(sequelize);
    }
    public async init(): Promise<void> {
        await this.sequelize.authenticate();
        logger.info("Sequelize connection established successfully!");
        await this.sequelize.sync();
        logger.info("Database schema synchronised");
    }
    public async close(): Promise<void> {
        await this.sequelize.close();
    }
    public async insert<E extends EntityType>(entity: E, row: EntityDataMap[E]): Promise<StoredEntity<E>> {
        const rowCreated = await this.entityModelMap[entity].create(toPlain(row), {transaction: this.transaction});
        return rowCreated.get({plain: true});
    }
    public async get<E extends EntityType>(entity: E, id: number): Promise<StoredEntity<E> | undefined> {
        const rowFound = await this.entityModelMap[entity].findByPk(id, {transaction: this.transaction});
        return rowFound ? rowFound.get({plain: true}) : undefined;
    }
    public async getAll<E extends EntityType>(entity: E, filter?: EntityFilter<StoredEntity<E>>): Promise<StoredEntity<E>[]> {
        const rowsFound = await this.entityModelMap[entity].findAll({
            where: filter && toPlain(filter),
            order: [["id", "ASC"]],
            transaction: this.transaction,
        });
        return rowsFound.map((row) => row.get({plain: true}));
    }
    public async update<E extends EntityType>(entity: E, id: number, newData: Partial<EntityDataMap[E]>): Promise<StoredEntity<E>> {
        const rowFound = await this.entityModelMap[entity].findByPk(id, {transaction: this.transaction});
        if (!rowFound) {
            throw ApiError.fromCode(apiErrors.NotFound, [entity, id.toString()]);
        }
        rowFound.set(toPlain(newData));
        await rowFound.save({transaction: this.transaction});
        return rowFound.get({plain: true});
    }
    public async remove(entity: EntityType, id: number): Promise<void> {
        await this.entityModelMap[entity].destroy({where: {id}, transaction: this.transaction});
    }
    public async atomic<T>(work: (connector: BaseDataConnector) => Promise<T>): Promise<T> {
        return this.serialize(() => this.sequelize.transaction(
            (transaction) => work(new SequelizeDataConnector(this.sequelize, transaction)),
        ));
    }
}
