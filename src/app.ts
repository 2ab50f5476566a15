import express, { ErrorRequestHandler } from "express";
import { v4 as uuid } from "uuid";
import { ApiError, apiErrors } from "./errors";
import { LibraryApiHelper } from "./library";
import { logger } from "./logger";
import { createAuthRouter } from "./routes/auth";
import { createBooksRouter } from "./routes/books";
import { createLoansRouter } from "./routes/loans";
import { createReportsRouter } from "./routes/reports";
import { createReservationsRouter } from "./routes/reservations";
import { createUsersRouter } from "./routes/users";

// 4xx status carried by body-parser errors (payload too large, unsupported charset...)
const clientErrorStatus = (error: unknown): number | undefined => {
    if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
        && error.status >= 400 && error.status < 500) {
        return error.status;
    }
    return;
}

const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }
    const clientStatus = clientErrorStatus(error);
    if (error instanceof ApiError) {
        logger.info(`${req.requestId}: ${error.code} ${error.message}`);
        res.status(error.code).send(error.toJSON());
    } else if (error instanceof SyntaxError) {
        // malformed JSON body
        logger.info(`${req.requestId}: ${error.message}`);
        res.status(apiErrors.BadRequest).send(ApiError.fromCode(apiErrors.BadRequest, ["JSON inválido"]).toJSON());
    } else if (clientStatus !== undefined) {
        logger.info(`${req.requestId}: ${clientStatus} ${error.message}`);
        res.status(clientStatus).send(ApiError.fromCode(apiErrors.BadRequest, ["Solicitud inválida"]).toJSON());
    } else {
        logger.error(error instanceof Error ? error.stack : String(error));
        res.status(apiErrors.InternalError).send(ApiError.fromCode(apiErrors.InternalError).toJSON());
    }
}

export const createApp = (libraryApiHelper: LibraryApiHelper) => {
    const app = express();
    app.use((req, res, next) => {
        req.requestId = uuid();
        res.on("finish", () => logger.info(`${req.requestId}: ${req.method} ${req.originalUrl} ${res.statusCode}`));
        next();
    });
    app.use(express.json());

    app.get("/health", (req, res) => {
        res.send({success: true});
    });
    app.use("/api/auth", createAuthRouter(libraryApiHelper));
    app.use("/api/libros", createBooksRouter(libraryApiHelper));
    app.use("/api/prestamos", createLoansRouter(libraryApiHelper));
    app.use("/api/reservas", createReservationsRouter(libraryApiHelper));
    app.use("/api/usuarios", createUsersRouter(libraryApiHelper));
    app.use("/api", createReportsRouter(libraryApiHelper));

    app.use((req, res, next) => {
        next(ApiError.fromCode(apiErrors.NotFound, ["Ruta", req.originalUrl]));
    });
    app.use(errorHandler);
    return app;
}
