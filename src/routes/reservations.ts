import { Router } from "express";
import { authenticate, currentUser, requireRole } from "../auth";
import { Role } from "../base-data-connector";
import { LibraryApiHelper } from "../library";
import { createReservationSchema, parse, parseId, reservationFilterSchema } from "../validation";
import { route } from "./route";

export const createReservationsRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();

    router.use(authenticate(libraryApiHelper));

    router.get("/", route("listReservations", async (req, res) => {
        res.send(await libraryApiHelper.listReservations(currentUser(req), parse(reservationFilterSchema, req.query)));
    }));

    router.get("/mis-reservas", route("listOwnReservations", async (req, res) => {
        res.send(await libraryApiHelper.listReservations(currentUser(req), parse(reservationFilterSchema, req.query), true));
    }));

    router.post("/", route("createReservation", async (req, res) => {
        const {libro} = parse(createReservationSchema, req.body);
        res.status(201).send(await libraryApiHelper.createReservation(currentUser(req), libro));
    }));

    router.post("/notificar-disponibilidad", requireRole(Role.LIBRARIAN, Role.ADMIN), route("notifyAvailability", async (req, res) => {
        res.send(await libraryApiHelper.notifyAvailability());
    }));

    router.delete("/:id", route("cancelReservation", async (req, res) => {
        await libraryApiHelper.cancelReservation(currentUser(req), parseId(req.params.id));
        res.status(204).end();
    }));

    return router;
}
