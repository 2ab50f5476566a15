import { Router } from "express";
import { LibraryApiHelper, toUserView } from "../library";
import { loginSchema, parse, registerSchema } from "../validation";
import { route } from "./route";

export const createAuthRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();

    router.post("/register", route("register", async (req, res) => {
        const {"contraseña": password, ...profile} = parse(registerSchema, req.body);
        const user = await libraryApiHelper.registerUser({...profile, password});
        res.status(201).send({mensaje: "Usuario registrado exitosamente", usuario: toUserView(user)});
    }));

    router.post("/login", route("login", async (req, res) => {
        const credentials = parse(loginSchema, req.body, "Correo y contraseña son requeridos");
        const {token, user} = await libraryApiHelper.login(credentials.correo, credentials["contraseña"]);
        res.send({token, usuario: toUserView(user)});
    }));

    return router;
}
