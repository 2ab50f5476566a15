import BigNumber from "bignumber.js";
import { compare, hash } from "bcryptjs";
import { EventEmitter } from "events";
import { issueToken, verifyToken } from "./auth";
import {
    ACTIVE_RESERVATION_STATUSES, BaseDataConnector, BookStatus, IBook, IEntityData, ILoan, IReservation, IUser,
    LoanStatus, ReservationStatus, Role,
} from "./base-data-connector";
import { config } from "./config";
import { ApiError, apiErrors, ErrorDetails } from "./errors";
import { addDays, addHours, daysLate, groupBy } from "./utils";

export interface IRegisterRequest {
    nombre: string;
    apellido: string;
    correo: string;
    password: string;
    edad: number;
    numeroIdentidad: string;
    telefono: string;
}
export interface IBookRequest {
    titulo: string;
    autor: string;
    isbn: string;
    categoria: string;
    editorial: string;
    anioPublicacion: number;
    copiasTotal: number;
    copiasDisponibles?: number;
    ubicacion: string;
    estado?: BookStatus;
    descripcion?: string;
}
export interface IBookFilter {
    categoria?: string;
    autor?: string;
    titulo?: string;
    disponible?: boolean;
}
export interface ILoanRequest {
    libro: number;
    fechaDevolucionEsperada?: Date;
    usuario?: number;
}
export interface ILoanFilter {
    usuario?: number;
    estado?: LoanStatus;
}
export interface IReservationFilter {
    libro?: number;
    estado?: ReservationStatus;
}
export enum FineAction {
    PAY = "pagar",
    WAIVE = "condonar",
    ADD = "agregar",
}
export interface ILibraryOptions {
    jwtSecret: string;
    // seconds
    jwtExpiresIn: number;
    loanDays: number;
    maxRenewals: number;
    maxActiveLoans: number;
    dailyFine: string;
    reservationHoldHours: number;
    passwordSaltRounds: number;
}
export interface IUserView {
    id: number;
    nombre: string;
    apellido: string;
    nombreCompleto: string;
    correo: string;
    edad: number;
    numeroIdentidad: string;
    telefono: string;
    rol: Role;
    activo: boolean;
    fechaRegistro: Date;
    multas: string;
}
export interface ILoanView extends ILoan {
    usuarioNombre: string | null;
    libroTitulo: string | null;
    libroAutor: string | null;
}
export interface IReservationView extends IReservation {
    usuarioNombre: string | null;
    libroTitulo: string | null;
    libroAutor: string | null;
}

const defaultOptions: ILibraryOptions = {
    jwtSecret: config.jwtSecret,
    jwtExpiresIn: config.jwtExpiresIn,
    loanDays: config.loanDays,
    maxRenewals: config.maxRenewals,
    maxActiveLoans: config.maxActiveLoans,
    dailyFine: config.dailyFine,
    reservationHoldHours: config.reservationHoldHours,
    passwordSaltRounds: 10,
};

export const isStaff = (user: IUser) => user.rol === Role.LIBRARIAN || user.rol === Role.ADMIN;

/** Book status after its available copies changed. Maintenance is only left through an explicit update. */
export const deriveBookStatus = (copiasDisponibles: number, estado: BookStatus): BookStatus => {
    if (copiasDisponibles === 0) {
        return BookStatus.EXHAUSTED;
    }
    return estado === BookStatus.EXHAUSTED ? BookStatus.AVAILABLE : estado;
}

export const toUserView = (user: IUser): IUserView => ({
    id: user.id,
    nombre: user.nombre,
    apellido: user.apellido,
    nombreCompleto: `${user.nombre} ${user.apellido}`.trim(),
    correo: user.correo,
    edad: user.edad,
    numeroIdentidad: user.numeroIdentidad,
    telefono: user.telefono,
    rol: user.rol,
    activo: user.activo,
    fechaRegistro: user.fechaRegistro,
    multas: user.multas,
});

const byId = <T extends IEntityData>(rows: T[]) => new Map(rows.map((row): [number, T] => [row.id, row]));

const unique = (ids: number[]) => [...new Set(ids)];

const contains = (value: string, search: string) => value.toLowerCase().includes(search.toLowerCase());

const notFound = (entityType: string, id: number) => ApiError.fromCode(apiErrors.NotFound, [entityType, id.toString()]);

const badRequest = (reason: string, details?: ErrorDetails) => ApiError.fromCode(apiErrors.BadRequest, [reason], details);

export class LibraryApiHelper extends EventEmitter {
    private dataConnector: BaseDataConnector;
    private options: ILibraryOptions;
    constructor(dataConnector: BaseDataConnector, options: Partial<ILibraryOptions> = {}) {
        super();
        this.dataConnector = dataConnector;
        this.options = {...defaultOptions, ...options};
    }

    public async registerUser(request: IRegisterRequest): Promise<IUser> {
        const passwordHash = await hash(request.password, this.options.passwordSaltRounds);
        return this.dataConnector.atomic(async (connector) => {
            const duplicates: ErrorDetails = {};
            if (await connector.getUserByEmail(request.correo)) {
                duplicates.correo = ["Este correo ya está registrado"];
            }
            if ((await connector.getUsers({numeroIdentidad: request.numeroIdentidad})).length > 0) {
                duplicates.numeroIdentidad = ["Este número de identidad ya existe"];
            }
            if (Object.keys(duplicates).length > 0) {
                throw badRequest("Datos inválidos", duplicates);
            }
            return connector.insertUser({
                nombre: request.nombre,
                apellido: request.apellido,
                correo: request.correo,
                passwordHash,
                edad: request.edad,
                numeroIdentidad: request.numeroIdentidad,
                telefono: request.telefono,
                rol: Role.USER,
                activo: true,
                fechaRegistro: new Date(),
                multas: "0.00",
            });
        });
    }
    public async login(correo: string, password: string): Promise<{token: string, user: IUser}> {
        const user = await this.dataConnector.getUserByEmail(correo);
        if (!user) {
            throw ApiError.fromCode(apiErrors.Unauthorized, ["Correo o contraseña incorrectos"]);
        }
        if (!user.activo) {
            throw ApiError.fromCode(apiErrors.Forbidden, ["Cuenta inactiva. Contacte al administrador."]);
        }
        if (!await compare(password, user.passwordHash)) {
            throw ApiError.fromCode(apiErrors.Unauthorized, ["Correo o contraseña incorrectos"]);
        }
        return {token: issueToken(user, this.options.jwtSecret, this.options.jwtExpiresIn), user};
    }
    /** The active user a bearer token was issued to, if the token is still valid. */
    public async authenticateToken(token: string): Promise<IUser | undefined> {
        const claims = verifyToken(token, this.options.jwtSecret);
        if (!claims) {
            return;
        }
        const user = await this.dataConnector.getUser(claims.userId);
        return user && user.activo ? user : undefined;
    }
    /** Creates the initial admin account unless one with that email exists. */
    public async ensureAdmin(correo: string, password: string): Promise<IUser> {
        const passwordHash = await hash(password, this.options.passwordSaltRounds);
        return this.dataConnector.atomic(async (connector) => {
            const existing = await connector.getUserByEmail(correo);
            if (existing) {
                return existing;
            }
            return connector.insertUser({
                nombre: "Administrador",
                apellido: "",
                correo,
                passwordHash,
                edad: 0,
                numeroIdentidad: `admin:${correo}`,
                telefono: "",
                rol: Role.ADMIN,
                activo: true,
                fechaRegistro: new Date(),
                multas: "0.00",
            });
        });
    }

    public async listBooks(filter: IBookFilter = {}): Promise<IBook[]> {
        const books = await this.dataConnector.getBooks();
        return books
            .filter((book) => filter.categoria === undefined || book.categoria.toLowerCase() === filter.categoria.toLowerCase())
            .filter((book) => filter.autor === undefined || contains(book.autor, filter.autor))
            .filter((book) => filter.titulo === undefined || contains(book.titulo, filter.titulo))
            .filter((book) => filter.disponible === undefined || (book.copiasDisponibles > 0) === filter.disponible)
            .sort((a, b) => a.titulo.localeCompare(b.titulo) || a.id - b.id);
    }
    public async getBook(bookId: number): Promise<IBook> {
        const book = await this.dataConnector.getBook(bookId);
        if (!book) {
            throw notFound("Libro", bookId);
        }
        return book;
    }
    public async createBook(request: IBookRequest): Promise<IBook> {
        const copiasDisponibles = request.copiasDisponibles === undefined ? request.copiasTotal : request.copiasDisponibles;
        if (copiasDisponibles > request.copiasTotal) {
            throw badRequest("Datos inválidos", {copiasDisponibles: ["No puede exceder el total de copias"]});
        }
        return this.dataConnector.atomic(async (connector) => {
            if ((await connector.getBooks({isbn: request.isbn})).length > 0) {
                throw badRequest("Datos inválidos", {isbn: ["Ya existe un libro con este ISBN"]});
            }
            return connector.insertBook({
                titulo: request.titulo,
                autor: request.autor,
                isbn: request.isbn,
                categoria: request.categoria,
                editorial: request.editorial,
                anioPublicacion: request.anioPublicacion,
                copiasTotal: request.copiasTotal,
                copiasDisponibles,
                ubicacion: request.ubicacion,
                estado: deriveBookStatus(copiasDisponibles, request.estado || BookStatus.AVAILABLE),
                descripcion: request.descripcion || "",
                fechaIngreso: new Date(),
            });
        });
    }
    public async updateBook(bookId: number, request: Partial<IBookRequest>): Promise<IBook> {
        const {copiasTotal: requestedTotal, copiasDisponibles: requestedAvailable, estado: requestedStatus, ...details} = request;
        const {book, notified} = await this.dataConnector.atomic(async (connector) => {
            const existing = await connector.getBook(bookId);
            if (!existing) {
                throw notFound("Libro", bookId);
            }
            const lent = existing.copiasTotal - existing.copiasDisponibles;
            const copiasTotal = requestedTotal === undefined ? existing.copiasTotal : requestedTotal;
            if (copiasTotal < lent) {
                throw badRequest("Datos inválidos", {copiasTotal: [`No puede ser menor que ${lent} (copias actualmente prestadas)`]});
            }
            // without an explicit value the lent copies stay lent
            const copiasDisponibles = requestedAvailable === undefined ? copiasTotal - lent : requestedAvailable;
            if (copiasDisponibles > copiasTotal) {
                throw badRequest("Datos inválidos", {copiasDisponibles: ["No puede exceder el total de copias"]});
            }
            if (details.isbn !== undefined && details.isbn !== existing.isbn && (await connector.getBooks({isbn: details.isbn})).length > 0) {
                throw badRequest("Datos inválidos", {isbn: ["Ya existe un libro con este ISBN"]});
            }
            const updated = await connector.updateBook(bookId, {
                ...details,
                copiasTotal,
                copiasDisponibles,
                estado: deriveBookStatus(copiasDisponibles, requestedStatus || existing.estado),
            });
            return {book: updated, notified: await this.notifyReservationQueue(connector, updated, new Date())};
        });
        this.emitNotified(notified);
        return book;
    }
    public async deleteBook(bookId: number): Promise<void> {
        await this.dataConnector.atomic(async (connector) => {
            if (!await connector.getBook(bookId)) {
                throw notFound("Libro", bookId);
            }
            if ((await connector.getActiveLoans({libroId: bookId})).length > 0) {
                throw badRequest("No se puede eliminar un libro con préstamos activos");
            }
            for (const reservation of await connector.getReservations({libroId: bookId})) {
                await connector.deleteReservation(reservation.id);
            }
            await connector.deleteBook(bookId);
        });
    }

    public async createLoan(actor: IUser, request: ILoanRequest): Promise<ILoanView> {
        const now = new Date();
        const borrowerId = request.usuario === undefined ? actor.id : request.usuario;
        if (borrowerId !== actor.id && !isStaff(actor)) {
            throw ApiError.fromCode(apiErrors.Forbidden, ["Solo el personal de la biblioteca puede prestar a nombre de otro usuario"]);
        }
        const fechaDevolucionEsperada = request.fechaDevolucionEsperada || addDays(now, this.options.loanDays);
        if (fechaDevolucionEsperada.getTime() <= now.getTime()) {
            throw badRequest("Datos inválidos", {fechaDevolucionEsperada: ["La fecha de devolución debe ser futura"]});
        }
        const loan = await this.dataConnector.atomic(async (connector) => {
            const borrower = await connector.getUser(borrowerId);
            if (!borrower) {
                throw notFound("Usuario", borrowerId);
            }
            if (!borrower.activo) {
                throw badRequest("La cuenta del usuario está inactiva");
            }
            if (new BigNumber(borrower.multas).isGreaterThan(0)) {
                throw badRequest("El usuario tiene multas pendientes de pago");
            }
            const activeLoans = await connector.getActiveLoans({usuarioId: borrower.id});
            if (activeLoans.length >= this.options.maxActiveLoans) {
                throw badRequest(`El usuario alcanzó el límite de ${this.options.maxActiveLoans} préstamos activos`);
            }
            if (activeLoans.some((activeLoan) => activeLoan.libroId === request.libro)) {
                throw badRequest("El usuario ya tiene un préstamo activo de este libro");
            }
            const book = await connector.getBook(request.libro);
            if (!book) {
                throw notFound("Libro", request.libro);
            }
            if (book.copiasDisponibles <= 0) {
                throw badRequest("El libro no tiene copias disponibles");
            }
            if (book.estado !== BookStatus.AVAILABLE) {
                throw badRequest("El libro no está disponible para préstamo");
            }
            const queue = await connector.getReservationQueue(book.id);
            const ownReservation = queue.find((reservation) => reservation.usuarioId === borrower.id);
            const heldForOthers = queue.filter((reservation) => reservation.estado === ReservationStatus.NOTIFIED && reservation.usuarioId !== borrower.id).length;
            if (book.copiasDisponibles - heldForOthers <= 0) {
                throw badRequest("Las copias disponibles están apartadas para otras reservas");
            }
            const copiasDisponibles = book.copiasDisponibles - 1;
            await connector.updateBook(book.id, {copiasDisponibles, estado: deriveBookStatus(copiasDisponibles, book.estado)});
            const created = await connector.insertLoan({
                usuarioId: borrower.id,
                libroId: book.id,
                fechaPrestamo: now,
                fechaDevolucionEsperada,
                fechaDevolucionReal: null,
                diasRetraso: 0,
                multaGenerada: "0.00",
                estado: LoanStatus.ACTIVE,
                renovaciones: 0,
            });
            if (ownReservation) {
                await connector.updateReservation(ownReservation.id, {estado: ReservationStatus.COMPLETED});
                await this.renumberReservationQueue(connector, book.id);
            }
            return created;
        });
        return (await this.describeLoans([loan]))[0];
    }
    public async listLoans(actor: IUser, filter: ILoanFilter = {}): Promise<ILoanView[]> {
        await this.refreshOverdueLoans(new Date());
        const loans = await this.dataConnector.getLoans({
            usuarioId: isStaff(actor) ? filter.usuario : actor.id,
            estado: filter.estado,
        });
        loans.sort((a, b) => b.fechaPrestamo.getTime() - a.fechaPrestamo.getTime() || b.id - a.id);
        return this.describeLoans(loans);
    }
    /** Unreturned loans past their due date, with the delay and fine accrued so far. */
    public async getOverdueLoans(): Promise<ILoanView[]> {
        const now = new Date();
        await this.refreshOverdueLoans(now);
        const loans = await this.dataConnector.getLoans({estado: LoanStatus.OVERDUE});
        loans.sort((a, b) => a.fechaDevolucionEsperada.getTime() - b.fechaDevolucionEsperada.getTime() || a.id - b.id);
        const views = await this.describeLoans(loans);
        return views.map((view) => {
            const diasRetraso = daysLate(view.fechaDevolucionEsperada, now);
            return {...view, diasRetraso, multaGenerada: this.fineFor(diasRetraso)};
        });
    }
    public async returnLoan(actor: IUser, loanId: number): Promise<ILoanView> {
        const {loan, notified} = await this.dataConnector.atomic(async (connector) => {
            const existing = await this.requireOwnLoan(connector, actor, loanId);
            if (existing.estado === LoanStatus.RETURNED) {
                throw badRequest("Este préstamo ya fue devuelto");
            }
            const now = new Date();
            const diasRetraso = daysLate(existing.fechaDevolucionEsperada, now);
            const multaGenerada = this.fineFor(diasRetraso);
            const returned = await connector.updateLoan(loanId, {
                estado: LoanStatus.RETURNED,
                fechaDevolucionReal: now,
                diasRetraso,
                multaGenerada,
            });
            if (diasRetraso > 0) {
                const borrower = await connector.getUser(existing.usuarioId);
                if (borrower) {
                    await connector.updateUser(borrower.id, {multas: new BigNumber(borrower.multas).plus(multaGenerada).toFixed(2)});
                }
            }
            const book = await connector.getBook(existing.libroId);
            if (!book) {
                return {loan: returned, notified: []};
            }
            const copiasDisponibles = Math.min(book.copiasTotal, book.copiasDisponibles + 1);
            const updatedBook = await connector.updateBook(book.id, {copiasDisponibles, estado: deriveBookStatus(copiasDisponibles, book.estado)});
            return {loan: returned, notified: await this.notifyReservationQueue(connector, updatedBook, now)};
        });
        this.emitNotified(notified);
        return (await this.describeLoans([loan]))[0];
    }
    public async renewLoan(actor: IUser, loanId: number): Promise<ILoanView> {
        const loan = await this.dataConnector.atomic(async (connector) => {
            const existing = await this.requireOwnLoan(connector, actor, loanId);
            if (existing.estado === LoanStatus.RETURNED) {
                throw badRequest("No se puede renovar un préstamo devuelto");
            }
            if (existing.estado === LoanStatus.OVERDUE || existing.fechaDevolucionEsperada.getTime() < Date.now()) {
                throw badRequest("No se puede renovar un préstamo vencido");
            }
            if (existing.renovaciones >= this.options.maxRenewals) {
                throw badRequest(`Se alcanzó el máximo de ${this.options.maxRenewals} renovaciones`);
            }
            const queue = await connector.getReservationQueue(existing.libroId);
            if (queue.some((reservation) => reservation.usuarioId !== existing.usuarioId)) {
                throw badRequest("Hay reservas activas de otros usuarios para este libro");
            }
            return connector.updateLoan(loanId, {
                fechaDevolucionEsperada: addDays(existing.fechaDevolucionEsperada, this.options.loanDays),
                renovaciones: existing.renovaciones + 1,
            });
        });
        return (await this.describeLoans([loan]))[0];
    }

    public async createReservation(actor: IUser, bookId: number): Promise<IReservationView> {
        const reservation = await this.dataConnector.atomic(async (connector) => {
            const book = await connector.getBook(bookId);
            if (!book) {
                throw notFound("Libro", bookId);
            }
            if (book.estado === BookStatus.MAINTENANCE) {
                throw badRequest("El libro está en mantenimiento y no puede ser reservado");
            }
            const queue = await connector.getReservationQueue(book.id);
            const held = queue.filter((r) => r.estado === ReservationStatus.NOTIFIED).length;
            if (book.copiasDisponibles - held > 0) {
                throw badRequest("El libro tiene copias disponibles. No se requiere reserva.");
            }
            if (queue.some((r) => r.usuarioId === actor.id)) {
                throw badRequest("Ya tiene una reserva activa para este libro");
            }
            if ((await connector.getActiveLoans({usuarioId: actor.id, libroId: book.id})).length > 0) {
                throw badRequest("Ya tiene un préstamo activo de este libro");
            }
            return connector.insertReservation({
                usuarioId: actor.id,
                libroId: book.id,
                fechaReserva: new Date(),
                estado: ReservationStatus.PENDING,
                fechaNotificacion: null,
                fechaExpiracion: null,
                prioridad: queue.length + 1,
            });
        });
        return (await this.describeReservations([reservation]))[0];
    }
    public async listReservations(actor: IUser, filter: IReservationFilter = {}, ownOnly = false): Promise<IReservationView[]> {
        const reservations = await this.dataConnector.getReservations({
            usuarioId: ownOnly || !isStaff(actor) ? actor.id : undefined,
            libroId: filter.libro,
            estado: filter.estado,
        });
        reservations.sort((a, b) => a.fechaReserva.getTime() - b.fechaReserva.getTime() || a.id - b.id);
        return this.describeReservations(reservations);
    }
    public async cancelReservation(actor: IUser, reservationId: number): Promise<void> {
        const notified = await this.dataConnector.atomic(async (connector) => {
            const reservation = await connector.getReservation(reservationId);
            if (!reservation) {
                throw notFound("Reserva", reservationId);
            }
            if (reservation.usuarioId !== actor.id && actor.rol !== Role.ADMIN) {
                throw ApiError.fromCode(apiErrors.Forbidden, ["Solo el propietario o un administrador puede cancelar esta reserva"]);
            }
            await connector.deleteReservation(reservation.id);
            if (!ACTIVE_RESERVATION_STATUSES.includes(reservation.estado)) {
                return [];
            }
            await this.renumberReservationQueue(connector, reservation.libroId);
            const book = await connector.getBook(reservation.libroId);
            return book ? this.notifyReservationQueue(connector, book, new Date()) : [];
        });
        this.emitNotified(notified);
    }
    /**
     * Cancels notified reservations whose hold expired, then notifies the head of
     * every queue whose book has copies not yet held for someone.
     */
    public async notifyAvailability(): Promise<{notificadas: IReservationView[], expiradas: number}> {
        const {notified, expired} = await this.dataConnector.atomic(async (connector) => {
            const now = new Date();
            const stale = (await connector.getReservations({estado: ReservationStatus.NOTIFIED}))
                .filter((reservation) => reservation.fechaExpiracion !== null && reservation.fechaExpiracion.getTime() < now.getTime());
            for (const reservation of stale) {
                await connector.updateReservation(reservation.id, {estado: ReservationStatus.CANCELLED});
            }
            for (const bookId of unique(stale.map((reservation) => reservation.libroId))) {
                await this.renumberReservationQueue(connector, bookId);
            }
            const newlyNotified: IReservation[] = [];
            for (const book of await connector.getBooks()) {
                if (book.copiasDisponibles > 0) {
                    newlyNotified.push(...await this.notifyReservationQueue(connector, book, now));
                }
            }
            return {notified: newlyNotified, expired: stale.length};
        });
        this.emitNotified(notified);
        return {notificadas: await this.describeReservations(notified), expiradas: expired};
    }

    public async getDelinquentUsers(): Promise<{usuario: IUserView, multas: string, prestamosVencidos: number}[]> {
        await this.refreshOverdueLoans(new Date());
        const overdueByUser = groupBy(await this.dataConnector.getLoans({estado: LoanStatus.OVERDUE}), (loan) => loan.usuarioId);
        const users = await this.dataConnector.getUsers();
        return users
            .map((user) => ({
                usuario: toUserView(user),
                multas: user.multas,
                prestamosVencidos: (overdueByUser.get(user.id) || []).length,
            }))
            .filter((entry) => entry.prestamosVencidos > 0 || new BigNumber(entry.multas).isGreaterThan(0))
            .sort((a, b) => new BigNumber(b.multas).comparedTo(a.multas) || b.prestamosVencidos - a.prestamosVencidos || a.usuario.id - b.usuario.id);
    }
    public async getPopularBooks(limit: number): Promise<{libro: IBook, totalPrestamos: number}[]> {
        const counts = await this.dataConnector.getLoanCountsByBook();
        const books = await this.dataConnector.getBooks({id: [...counts.keys()]});
        return books
            .map((book) => ({libro: book, totalPrestamos: counts.get(book.id) || 0}))
            .sort((a, b) => b.totalPrestamos - a.totalPrestamos || a.libro.titulo.localeCompare(b.libro.titulo))
            .slice(0, limit);
    }
    public async getHistory(actor: IUser) {
        await this.refreshOverdueLoans(new Date());
        const user = await this.dataConnector.getUser(actor.id);
        if (!user) {
            throw notFound("Usuario", actor.id);
        }
        const loans = await this.dataConnector.getLoans({usuarioId: user.id});
        loans.sort((a, b) => b.fechaPrestamo.getTime() - a.fechaPrestamo.getTime() || b.id - a.id);
        const reservations = await this.dataConnector.getReservations({usuarioId: user.id});
        reservations.sort((a, b) => b.fechaReserva.getTime() - a.fechaReserva.getTime() || b.id - a.id);
        return {
            usuario: toUserView(user),
            prestamos: await this.describeLoans(loans),
            reservas: await this.describeReservations(reservations),
            multasPendientes: user.multas,
        };
    }
    public async getStatistics() {
        await this.refreshOverdueLoans(new Date());
        const [users, books, loans, reservations] = await Promise.all([
            this.dataConnector.getUsers(),
            this.dataConnector.getBooks(),
            this.dataConnector.getLoans(),
            this.dataConnector.getReservations({estado: ACTIVE_RESERVATION_STATUSES}),
        ]);
        const countUsers = (rol: Role) => users.filter((user) => user.rol === rol).length;
        const countLoans = (estado: LoanStatus) => loans.filter((loan) => loan.estado === estado).length;
        return {
            usuarios: {
                total: users.length,
                activos: users.filter((user) => user.activo).length,
                porRol: {
                    [Role.USER]: countUsers(Role.USER),
                    [Role.LIBRARIAN]: countUsers(Role.LIBRARIAN),
                    [Role.ADMIN]: countUsers(Role.ADMIN),
                },
            },
            libros: {
                total: books.length,
                agotados: books.filter((book) => book.estado === BookStatus.EXHAUSTED).length,
                enMantenimiento: books.filter((book) => book.estado === BookStatus.MAINTENANCE).length,
                copiasTotal: books.reduce((sum, book) => sum + book.copiasTotal, 0),
                copiasDisponibles: books.reduce((sum, book) => sum + book.copiasDisponibles, 0),
            },
            prestamos: {
                total: loans.length,
                activos: countLoans(LoanStatus.ACTIVE),
                vencidos: countLoans(LoanStatus.OVERDUE),
                devueltos: countLoans(LoanStatus.RETURNED),
            },
            reservasActivas: reservations.length,
            multasPendientes: users.reduce((sum, user) => sum.plus(user.multas), new BigNumber(0)).toFixed(2),
        };
    }

    public async changeRole(actor: IUser, userId: number, rol: Role): Promise<IUser> {
        if (userId === actor.id) {
            throw badRequest("No puede cambiar su propio rol");
        }
        return this.dataConnector.atomic(async (connector) => {
            await this.requireUser(connector, userId);
            return connector.updateUser(userId, {rol});
        });
    }
    public async manageFine(userId: number, accion: FineAction, monto?: string): Promise<IUser> {
        return this.dataConnector.atomic(async (connector) => {
            const user = await this.requireUser(connector, userId);
            const current = new BigNumber(user.multas);
            if (accion === FineAction.WAIVE) {
                return connector.updateUser(userId, {multas: "0.00"});
            }
            if (monto === undefined) {
                throw badRequest("Datos inválidos", {monto: ["El monto es requerido para esta acción"]});
            }
            if (accion === FineAction.PAY && current.isLessThan(monto)) {
                throw badRequest(`El monto excede la multa pendiente (${current.toFixed(2)})`);
            }
            const multas = accion === FineAction.PAY ? current.minus(monto) : current.plus(monto);
            return connector.updateUser(userId, {multas: multas.toFixed(2)});
        });
    }
    public async toggleStatus(actor: IUser, userId: number): Promise<IUser> {
        if (userId === actor.id) {
            throw badRequest("No puede desactivar su propia cuenta");
        }
        return this.dataConnector.atomic(async (connector) => {
            const user = await this.requireUser(connector, userId);
            return connector.updateUser(userId, {activo: !user.activo});
        });
    }

    private fineFor(diasRetraso: number): string {
        return new BigNumber(this.options.dailyFine).multipliedBy(diasRetraso).toFixed(2);
    }
    private async requireUser(connector: BaseDataConnector, userId: number): Promise<IUser> {
        const user = await connector.getUser(userId);
        if (!user) {
            throw notFound("Usuario", userId);
        }
        return user;
    }
    private async requireOwnLoan(connector: BaseDataConnector, actor: IUser, loanId: number): Promise<ILoan> {
        const loan = await connector.getLoan(loanId);
        if (!loan) {
            throw notFound("Préstamo", loanId);
        }
        if (loan.usuarioId !== actor.id && !isStaff(actor)) {
            throw ApiError.fromCode(apiErrors.Forbidden);
        }
        return loan;
    }
    /** Marks unreturned loans past their due date as overdue. */
    private async refreshOverdueLoans(now: Date): Promise<void> {
        await this.dataConnector.atomic(async (connector) => {
            for (const loan of await connector.getLoans({estado: LoanStatus.ACTIVE})) {
                if (loan.fechaDevolucionEsperada.getTime() < now.getTime()) {
                    await connector.updateLoan(loan.id, {estado: LoanStatus.OVERDUE});
                }
            }
        });
    }
    private async renumberReservationQueue(connector: BaseDataConnector, bookId: number): Promise<void> {
        const queue = await connector.getReservationQueue(bookId);
        for (const [index, reservation] of queue.entries()) {
            if (reservation.prioridad !== index + 1) {
                await connector.updateReservation(reservation.id, {prioridad: index + 1});
            }
        }
    }
    /** Notifies pending reservations, in priority order, for copies of `book` nobody holds yet. */
    private async notifyReservationQueue(connector: BaseDataConnector, book: IBook, now: Date): Promise<IReservation[]> {
        if (book.estado === BookStatus.MAINTENANCE) {
            return [];
        }
        const queue = await connector.getReservationQueue(book.id);
        const held = queue.filter((reservation) => reservation.estado === ReservationStatus.NOTIFIED).length;
        const toNotify = queue
            .filter((reservation) => reservation.estado === ReservationStatus.PENDING)
            .slice(0, Math.max(0, book.copiasDisponibles - held));
        const notified: IReservation[] = [];
        for (const reservation of toNotify) {
            notified.push(await connector.updateReservation(reservation.id, {
                estado: ReservationStatus.NOTIFIED,
                fechaNotificacion: now,
                fechaExpiracion: addHours(now, this.options.reservationHoldHours),
            }));
        }
        return notified;
    }
    private emitNotified(reservations: IReservation[]) {
        reservations.forEach((reservation) => this.emit("reservationNotified", reservation));
    }
    private async describeLoans(loans: ILoan[]): Promise<ILoanView[]> {
        const users = byId(await this.dataConnector.getUsers({id: unique(loans.map((loan) => loan.usuarioId))}));
        const books = byId(await this.dataConnector.getBooks({id: unique(loans.map((loan) => loan.libroId))}));
        return loans.map((loan) => {
            const user = users.get(loan.usuarioId);
            const book = books.get(loan.libroId);
            return {
                ...loan,
                usuarioNombre: user ? toUserView(user).nombreCompleto : null,
                libroTitulo: book ? book.titulo : null,
                libroAutor: book ? book.autor : null,
            };
        });
    }
    private async describeReservations(reservations: IReservation[]): Promise<IReservationView[]> {
        const users = byId(await this.dataConnector.getUsers({id: unique(reservations.map((r) => r.usuarioId))}));
        const books = byId(await this.dataConnector.getBooks({id: unique(reservations.map((r) => r.libroId))}));
        return reservations.map((reservation) => {
            const user = users.get(reservation.usuarioId);
            const book = books.get(reservation.libroId);
            return {
                ...reservation,
                usuarioNombre: user ? toUserView(user).nombreCompleto : null,
                libroTitulo: book ? book.titulo : null,
                libroAutor: book ? book.autor : null,
            };
        });
    }
}
