import { BaseDataConnector } from "./base-data-connector";
import { InMemoryDataConnector } from "./in-memory-data-connector";
import { SequelizeDataConnector } from "./sequelize-data-connector";

export type DataConnectorType = "InMemoryDataConnector" | "SequelizeDataConnector";

export const createDataConnector = (type: DataConnectorType): BaseDataConnector => {
    switch (type) {
        case "InMemoryDataConnector":
            return new InMemoryDataConnector();
        case "SequelizeDataConnector":
            return new SequelizeDataConnector();
    }
}
