import chai from "chai";
import sinon from "sinon";
import { BookStatus, LoanStatus, Role } from "../base-data-connector";
import { ApiError } from "../errors";
import { setupLibrary } from "./helpers";

const DAY = 24 * 60 * 60 * 1000;

describe("Loans", () => {
    afterEach(() => {
        sinon.restore();
    });

    it("lends a copy for the default period", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {app, signUp, addBook, dataConnector} = setupLibrary();
        const user = await signUp();
        const book = await addBook({copiasTotal: 1, titulo: "Pedro Páramo", autor: "Juan Rulfo"});
        const res = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        res.should.have.status(201);
        sinon.assert.match(res.body, sinon.match({
            usuarioId: user.id,
            libroId: book.id,
            estado: LoanStatus.ACTIVE,
            renovaciones: 0,
            multaGenerada: "0.00",
            fechaDevolucionReal: null,
            fechaDevolucionEsperada: new Date(clock.now + 14 * DAY).toISOString(),
            usuarioNombre: "Ana Pérez",
            libroTitulo: "Pedro Páramo",
            libroAutor: "Juan Rulfo",
        }));
        const stored = await dataConnector.getBook(book.id);
        chai.expect(stored).to.include({copiasDisponibles: 0, estado: BookStatus.EXHAUSTED});
    });

    it("refuses a book without available copies", async () => {
        const {app, signUp, addBook} = setupLibrary();
        const first = await signUp();
        const second = await signUp();
        const book = await addBook({copiasTotal: 1});
        await chai.request(app).post("/api/prestamos").set("Authorization", first.token).send({libro: book.id});
        const res = await chai.request(app).post("/api/prestamos").set("Authorization", second.token).send({libro: book.id});
        res.should.have.status(400);
        res.body.should.deep.equal({error: "El libro no tiene copias disponibles"});
    });

    it("refuses a due date in the past", async () => {
        const {app, signUp, addBook} = setupLibrary();
        const user = await signUp();
        const book = await addBook();
        const res = await chai.request(app).post("/api/prestamos").set("Authorization", user.token)
            .send({libro: book.id, fechaDevolucionEsperada: "2001-01-01T00:00:00Z"});
        res.should.have.status(400);
        res.body.detalles.should.deep.equal({fechaDevolucionEsperada: ["La fecha de devolución debe ser futura"]});
    });

    it("only lets staff lend on behalf of another user", async () => {
        const {app, signUp, addBook} = setupLibrary();
        const librarian = await signUp(Role.LIBRARIAN);
        const user = await signUp();
        const other = await signUp();
        const book = await addBook();
        const refused = await chai.request(app).post("/api/prestamos").set("Authorization", other.token).send({libro: book.id, usuario: user.id});
        refused.should.have.status(403);
        const lent = await chai.request(app).post("/api/prestamos").set("Authorization", librarian.token).send({libro: book.id, usuario: user.id});
        lent.should.have.status(201);
        lent.body.usuarioId.should.equal(user.id);
    });

    it("enforces the active loan limit and refuses the same book twice", async () => {
        const {app, signUp, addBook} = setupLibrary({maxActiveLoans: 2});
        const user = await signUp();
        const [first, second, third] = [await addBook(), await addBook(), await addBook()];
        (await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: first.id})).should.have.status(201);
        const again = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: first.id});
        again.body.should.deep.equal({error: "El usuario ya tiene un préstamo activo de este libro"});
        (await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: second.id})).should.have.status(201);
        const overLimit = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: third.id});
        overLimit.should.have.status(400);
        overLimit.body.should.deep.equal({error: "El usuario alcanzó el límite de 2 préstamos activos"});
    });

    it("refuses users with pending fines", async () => {
        const {app, signUp, addBook, dataConnector} = setupLibrary();
        const user = await signUp();
        const book = await addBook();
        await dataConnector.updateUser(user.id, {multas: "10.00"});
        const res = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        res.should.have.status(400);
        res.body.should.deep.equal({error: "El usuario tiene multas pendientes de pago"});
    });

    it("returns a copy on time without a fine", async () => {
        const {app, signUp, addBook, dataConnector} = setupLibrary();
        const user = await signUp();
        const book = await addBook({copiasTotal: 1});
        const loan = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        const res = await chai.request(app).put(`/api/prestamos/${loan.body.id}/devolver`).set("Authorization", user.token);
        res.should.have.status(200);
        sinon.assert.match(res.body, sinon.match({estado: LoanStatus.RETURNED, diasRetraso: 0, multaGenerada: "0.00"}));
        chai.expect(await dataConnector.getBook(book.id)).to.include({copiasDisponibles: 1, estado: BookStatus.AVAILABLE});

        const twice = await chai.request(app).put(`/api/prestamos/${loan.body.id}/devolver`).set("Authorization", user.token);
        twice.should.have.status(400);
        twice.body.should.deep.equal({error: "Este préstamo ya fue devuelto"});
        const renewed = await chai.request(app).put(`/api/prestamos/${loan.body.id}/renovar`).set("Authorization", user.token);
        renewed.should.have.status(400);
        renewed.body.should.deep.equal({error: "No se puede renovar un préstamo devuelto"});
    });

    it("charges the daily fine for a late return", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {app, signUp, addBook, dataConnector} = setupLibrary();
        const user = await signUp();
        const book = await addBook();
        const loan = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        clock.tick(17 * DAY);
        const res = await chai.request(app).put(`/api/prestamos/${loan.body.id}/devolver`).set("Authorization", user.token);
        res.should.have.status(200);
        sinon.assert.match(res.body, sinon.match({estado: LoanStatus.RETURNED, diasRetraso: 3, multaGenerada: "15.00"}));
        chai.expect(await dataConnector.getUser(user.id)).to.include({multas: "15.00"});
    });

    it("lists overdue loans with the fine accrued so far", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {app, signUp, addBook} = setupLibrary();
        const librarian = await signUp(Role.LIBRARIAN);
        const user = await signUp();
        const book = await addBook();
        await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        clock.tick(15 * DAY);

        const res = await chai.request(app).get("/api/prestamos/vencidos").set("Authorization", librarian.token);
        res.should.have.status(200);
        res.body.should.have.lengthOf(1);
        sinon.assert.match(res.body[0], sinon.match({usuarioId: user.id, estado: LoanStatus.OVERDUE, diasRetraso: 1, multaGenerada: "5.00"}));

        (await chai.request(app).get("/api/prestamos/vencidos").set("Authorization", user.token)).should.have.status(403);
    });

    it("shows plain users only their own loans", async () => {
        const {app, signUp, addBook} = setupLibrary();
        const admin = await signUp(Role.ADMIN);
        const first = await signUp();
        const second = await signUp();
        const book = await addBook();
        await chai.request(app).post("/api/prestamos").set("Authorization", first.token).send({libro: book.id});
        const other = await chai.request(app).post("/api/prestamos").set("Authorization", second.token).send({libro: book.id});

        const own = await chai.request(app).get("/api/prestamos").set("Authorization", first.token);
        own.body.map((loan: {usuarioId: number}) => loan.usuarioId).should.deep.equal([first.id]);
        const all = await chai.request(app).get("/api/prestamos").set("Authorization", admin.token);
        all.body.should.have.lengthOf(2);
        const filtered = await chai.request(app).get("/api/prestamos").query({usuario: second.id}).set("Authorization", admin.token);
        filtered.body.map((loan: {id: number}) => loan.id).should.deep.equal([other.body.id]);

        const foreign = await chai.request(app).put(`/api/prestamos/${other.body.id}/devolver`).set("Authorization", first.token);
        foreign.should.have.status(403);
    });

    it("renews up to the maximum", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {app, signUp, addBook} = setupLibrary();
        const user = await signUp();
        const book = await addBook();
        const loan = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        const renew = () => chai.request(app).put(`/api/prestamos/${loan.body.id}/renovar`).set("Authorization", user.token);

        const first = await renew();
        first.should.have.status(200);
        first.body.renovaciones.should.equal(1);
        first.body.fechaDevolucionEsperada.should.equal(new Date(clock.now + 28 * DAY).toISOString());
        (await renew()).body.renovaciones.should.equal(2);
        const third = await renew();
        third.should.have.status(400);
        third.body.should.deep.equal({error: "Se alcanzó el máximo de 2 renovaciones"});
    });

    it("refuses to renew an overdue loan", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {app, signUp, addBook} = setupLibrary();
        const user = await signUp();
        const book = await addBook();
        const loan = await chai.request(app).post("/api/prestamos").set("Authorization", user.token).send({libro: book.id});
        clock.tick(15 * DAY);
        const res = await chai.request(app).put(`/api/prestamos/${loan.body.id}/renovar`).set("Authorization", user.token);
        res.should.have.status(400);
        res.body.should.deep.equal({error: "No se puede renovar un préstamo vencido"});
    });

    it("refuses to renew while others wait for the book", async () => {
        const {app, signUp, addBook} = setupLibrary();
        const borrower = await signUp();
        const waiting = await signUp();
        const book = await addBook({copiasTotal: 1});
        const loan = await chai.request(app).post("/api/prestamos").set("Authorization", borrower.token).send({libro: book.id});
        await chai.request(app).post("/api/reservas").set("Authorization", waiting.token).send({libro: book.id});
        const res = await chai.request(app).put(`/api/prestamos/${loan.body.id}/renovar`).set("Authorization", borrower.token);
        res.should.have.status(400);
        res.body.should.deep.equal({error: "Hay reservas activas de otros usuarios para este libro"});
    });

    it("never reopens a loan returned while overdue loans are being marked", async () => {
        const clock = sinon.useFakeTimers({now: new Date("2026-05-04T12:00:00Z"), toFake: ["Date"]});
        const {libraryApiHelper, signUp, addBook, storedUser, dataConnector} = setupLibrary();
        const admin = await storedUser((await signUp(Role.ADMIN)).id);
        const borrower = await storedUser((await signUp()).id);
        for (let i = 0; i < 5; i++) {
            const other = await storedUser((await signUp()).id);
            await libraryApiHelper.createLoan(other, {libro: (await addBook()).id});
        }
        const loan = await libraryApiHelper.createLoan(borrower, {libro: (await addBook()).id});
        clock.tick(16 * DAY);

        const [listed, returned] = await Promise.all([
            libraryApiHelper.listLoans(admin),
            libraryApiHelper.returnLoan(borrower, loan.id),
        ]);
        listed.should.have.lengthOf(6);
        returned.estado.should.equal(LoanStatus.RETURNED);
        chai.expect(await dataConnector.getLoan(loan.id)).to.include({estado: LoanStatus.RETURNED});

        let secondReturn: unknown;
        try {
            await libraryApiHelper.returnLoan(borrower, loan.id);
        } catch (error) {
            secondReturn = error;
        }
        chai.expect(secondReturn).to.be.an.instanceOf(ApiError).with.property("message", "Este préstamo ya fue devuelto");
        (await storedUser(borrower.id)).multas.should.equal("10.00");
    });
});
