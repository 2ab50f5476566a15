import { createApp } from "./app";
import { IReservation } from "./base-data-connector";
import { config } from "./config";
import { createDataConnector } from "./data-connectors";
import { LibraryApiHelper } from "./library";
import { logger } from "./logger";

const dataConnector = createDataConnector(config.dataConnector);
const libraryApiHelper = new LibraryApiHelper(dataConnector);

libraryApiHelper.on("reservationNotified", (reservation: IReservation) => {
    logger.info(`reservation ${reservation.id}: user ${reservation.usuarioId} notified, book ${reservation.libroId} held until ${reservation.fechaExpiracion ? reservation.fechaExpiracion.toISOString() : "-"}`);
});

const main = async () => {
    await dataConnector.init();
    logger.info(`${config.dataConnector} initialised`);
    if (config.admin) {
        const admin = await libraryApiHelper.ensureAdmin(config.admin.correo, config.admin.contrasena);
        logger.info(`admin account ready: ${admin.correo}`);
    }
    const app = createApp(libraryApiHelper);
    app.listen(config.port, () => {
        logger.info(`API server listening on port ${config.port}!`);
    });
}

main().catch((error) => {
    logger.error(error instanceof Error ? error.stack : String(error));
    process.exit(1);
});
