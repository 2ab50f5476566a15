import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const envSchema = z.object({
    API_PORT: z.coerce.number().int().positive().default(3000),
    DATA_CONNECTOR: z.enum(["SequelizeDataConnector", "InMemoryDataConnector"]).default("SequelizeDataConnector"),
    DB_CONNECTION_STRING: z.string().min(1).default("sqlite::memory:"),
    JWT_SECRET: z.string().min(1).default("change-me"),
    // seconds
    JWT_EXPIRES_IN: z.coerce.number().int().positive().default(24 * 60 * 60),
    LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
    LOAN_DAYS: z.coerce.number().int().positive().default(14),
    MAX_RENEWALS: z.coerce.number().int().nonnegative().default(2),
    MAX_ACTIVE_LOANS: z.coerce.number().int().positive().default(3),
    DAILY_FINE: z.string().regex(/^\d+(\.\d{1,2})?$/).default("5.00"),
    RESERVATION_HOLD_HOURS: z.coerce.number().int().positive().default(48),
    ADMIN_CORREO: z.string().email().optional(),
    ADMIN_CONTRASENA: z.string().min(6).optional(),
});

const env = envSchema.parse(process.env);

export const config = {
    port: env.API_PORT,
    dataConnector: env.DATA_CONNECTOR,
    dbConnectionString: env.DB_CONNECTION_STRING,
    logLevel: env.LOG_LEVEL,
    jwtSecret: env.JWT_SECRET,
    jwtExpiresIn: env.JWT_EXPIRES_IN,
    loanDays: env.LOAN_DAYS,
    maxRenewals: env.MAX_RENEWALS,
    maxActiveLoans: env.MAX_ACTIVE_LOANS,
    dailyFine: env.DAILY_FINE,
    reservationHoldHours: env.RESERVATION_HOLD_HOURS,
    admin: env.ADMIN_CORREO && env.ADMIN_CONTRASENA
        ? { correo: env.ADMIN_CORREO, contrasena: env.ADMIN_CONTRASENA }
        : undefined,
};
