import { Router } from "express";
import { authenticate, currentUser, requireRole } from "../auth";
import { Role } from "../base-data-connector";
import { LibraryApiHelper, toUserView } from "../library";
import { changeRoleSchema, manageFineSchema, parse, parseId } from "../validation";
import { route } from "./route";

export const createUsersRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();

    router.use(authenticate(libraryApiHelper), requireRole(Role.ADMIN));

    router.put("/:id/cambiar-rol", route("changeRole", async (req, res) => {
        const {rol} = parse(changeRoleSchema, req.body);
        const user = await libraryApiHelper.changeRole(currentUser(req), parseId(req.params.id), rol);
        res.send({mensaje: "Rol actualizado", usuario: toUserView(user)});
    }));

    router.put("/:id/gestionar-multa", route("manageFine", async (req, res) => {
        const {accion, monto} = parse(manageFineSchema, req.body);
        const user = await libraryApiHelper.manageFine(parseId(req.params.id), accion, monto);
        res.send({mensaje: "Multa actualizada", usuario: toUserView(user)});
    }));

    router.put("/:id/toggle-estado", route("toggleStatus", async (req, res) => {
        const user = await libraryApiHelper.toggleStatus(currentUser(req), parseId(req.params.id));
        res.send({mensaje: user.activo ? "Usuario activado" : "Usuario desactivado", usuario: toUserView(user)});
    }));

    return router;
}
