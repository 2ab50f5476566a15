import { Router } from "express";
import { authenticate, currentUser, requireRole } from "../auth";
import { Role } from "../base-data-connector";
import { LibraryApiHelper } from "../library";
import { parse, popularBooksSchema } from "../validation";
import { route } from "./route";

// mounted at /api: serves /reportes/* and /estadisticas
export const createReportsRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();
    const auth = authenticate(libraryApiHelper);

    router.get("/reportes/usuarios-morosos", auth, requireRole(Role.LIBRARIAN, Role.ADMIN), route("getDelinquentUsers", async (req, res) => {
        res.send(await libraryApiHelper.getDelinquentUsers());
    }));

    router.get("/reportes/libros-populares", auth, route("getPopularBooks", async (req, res) => {
        const {limite} = parse(popularBooksSchema, req.query);
        res.send(await libraryApiHelper.getPopularBooks(limite));
    }));

    router.get("/reportes/mi-historial", auth, route("getHistory", async (req, res) => {
        res.send(await libraryApiHelper.getHistory(currentUser(req)));
    }));

    router.get("/estadisticas", auth, requireRole(Role.ADMIN), route("getStatistics", async (req, res) => {
        res.send(await libraryApiHelper.getStatistics());
    }));

    return router;
}
