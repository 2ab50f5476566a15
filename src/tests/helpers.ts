import chai from "chai";
import chaiHttp from "chai-http";
import { createApp } from "../app";
import { IUser, Role } from "../base-data-connector";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import { IBookRequest, ILibraryOptions, LibraryApiHelper } from "../library";
import { logger } from "../logger";

chai.use(chaiHttp);
export const should = chai.should();

logger.silent = true;

let sequence = 0;

export interface IRegisterPayload {
    nombre: string;
    apellido: string;
    correo: string;
    "contraseña": string;
    edad: number;
    numeroIdentidad: string;
    telefono: string;
}

export const userPayload = (overrides: Partial<IRegisterPayload> = {}): IRegisterPayload => {
    sequence += 1;
    return {
        nombre: "Ana",
        apellido: "Pérez",
        correo: `lector${sequence}@example.com`,
        "contraseña": "secreto123",
        edad: 30,
        numeroIdentidad: `ID-${sequence}`,
        telefono: "555-0100",
        ...overrides,
    };
}

export const bookPayload = (overrides: Partial<IBookRequest> = {}): IBookRequest => {
    sequence += 1;
    return {
        titulo: `Libro ${sequence}`,
        autor: "Autora Ejemplo",
        isbn: `978-${sequence}`,
        categoria: "Novela",
        editorial: "Editorial Ejemplo",
        anioPublicacion: 2001,
        copiasTotal: 2,
        ubicacion: "Estante A",
        ...overrides,
    };
}

export interface ITestUser {
    id: number;
    correo: string;
    token: string;
}

/** In-memory library behind a fresh app, with helpers to seed accounts and books. */
export const setupLibrary = (options: Partial<ILibraryOptions> = {}) => {
    const dataConnector = new InMemoryDataConnector();
    const libraryApiHelper = new LibraryApiHelper(dataConnector, {jwtSecret: "test-secret", passwordSaltRounds: 4, ...options});
    const app = createApp(libraryApiHelper);

    const signUp = async (rol: Role = Role.USER): Promise<ITestUser> => {
        const payload = userPayload();
        const registered = await chai.request(app).post("/api/auth/register").send(payload);
        const id: number = registered.body.usuario.id;
        if (rol !== Role.USER) {
            await dataConnector.updateUser(id, {rol});
        }
        const loggedIn = await chai.request(app).post("/api/auth/login").send({correo: payload.correo, "contraseña": payload["contraseña"]});
        return {id, correo: payload.correo, token: `Bearer ${loggedIn.body.token}`};
    };
    const addBook = (overrides: Partial<IBookRequest> = {}) => libraryApiHelper.createBook(bookPayload(overrides));
    const storedUser = async (id: number): Promise<IUser> => {
        const user = await dataConnector.getUser(id);
        if (!user) {
            throw new Error(`user ${id} not stored`);
        }
        return user;
    };

    return {app, dataConnector, libraryApiHelper, signUp, addBook, storedUser};
}
