import { Sequelize } from "sequelize";
import { config } from "../config";
import { logger } from "../logger";

export const createConnection = (connectionString: string = config.dbConnectionString) =>
    new Sequelize(connectionString, {logging: msg => logger.debug(msg)});
