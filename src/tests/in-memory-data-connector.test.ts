import chai from "chai";
import { IUserData, Role } from "../base-data-connector";
import { InMemoryDataConnector } from "../in-memory-data-connector";
import "./helpers";

const userData = (): IUserData => ({
    nombre: "Luis",
    apellido: "Gómez",
    correo: "luis@example.com",
    passwordHash: "hash",
    edad: 40,
    numeroIdentidad: "ID-LUIS",
    telefono: "555-0101",
    rol: Role.USER,
    activo: true,
    fechaRegistro: new Date("2026-01-01T00:00:00Z"),
    multas: "0.00",
});

describe("InMemoryDataConnector", () => {
    it("rolls back only the writes of the failed unit", async () => {
        const dataConnector = new InMemoryDataConnector();
        const user = await dataConnector.insertUser(userData());
        const [unit, outside] = await Promise.allSettled([
            dataConnector.atomic(async (connector) => {
                await connector.updateUser(user.id, {multas: "1.00"});
                throw new Error("abort");
            }),
            dataConnector.updateUser(user.id, {activo: false}),
        ]);
        unit.status.should.equal("rejected");
        outside.status.should.equal("fulfilled");
        chai.expect(await dataConnector.getUser(user.id)).to.include({multas: "0.00", activo: false});
    });

    it("keeps the writes of a successful unit", async () => {
        const dataConnector = new InMemoryDataConnector();
        const user = await dataConnector.insertUser(userData());
        const updated = await dataConnector.atomic((connector) => connector.updateUser(user.id, {multas: "2.50"}));
        updated.multas.should.equal("2.50");
        chai.expect(await dataConnector.getUser(user.id)).to.include({multas: "2.50"});
    });

    it("returns copies the caller cannot use to change stored rows", async () => {
        const dataConnector = new InMemoryDataConnector();
        const user = await dataConnector.insertUser(userData());
        user.nombre = "Otro";
        chai.expect(await dataConnector.getUser(user.id)).to.include({nombre: "Luis"});
    });
});
