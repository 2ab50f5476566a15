export interface IEntityData {
    id: number;
}
export enum Role {
    USER = "usuario",
    LIBRARIAN = "bibliotecario",
    ADMIN = "admin",
}
export enum BookStatus {
    AVAILABLE = "disponible",
    EXHAUSTED = "agotado",
    MAINTENANCE = "en mantenimiento",
}
export enum LoanStatus {
    ACTIVE = "activo",
    OVERDUE = "vencido",
    RETURNED = "devuelto",
}
export enum ReservationStatus {
    PENDING = "pendiente",
    NOTIFIED = "notificada",
    COMPLETED = "completada",
    CANCELLED = "cancelada",
}
export interface IUserData {
    nombre: string;
    apellido: string;
    correo: string;
    passwordHash: string;
    edad: number;
    numeroIdentidad: string;
    telefono: string;
    rol: Role;
    activo: boolean;
    fechaRegistro: Date;
    // decimal string with two places
    multas: string;
}
export interface IBookData {
    titulo: string;
    autor: string;
    isbn: string;
    categoria: string;
    editorial: string;
    anioPublicacion: number;
    copiasTotal: number;
    copiasDisponibles: number;
    ubicacion: string;
    estado: BookStatus;
    descripcion: string;
    fechaIngreso: Date;
}
export interface ILoanData {
    usuarioId: number;
    libroId: number;
    fechaPrestamo: Date;
    fechaDevolucionEsperada: Date;
    fechaDevolucionReal: Date | null;
    diasRetraso: number;
    multaGenerada: string;
    estado: LoanStatus;
    renovaciones: number;
}
export interface IReservationData {
    usuarioId: number;
    libroId: number;
    fechaReserva: Date;
    estado: ReservationStatus;
    fechaNotificacion: Date | null;
    fechaExpiracion: Date | null;
    prioridad: number;
}
export interface IUser extends IUserData, IEntityData {}
export interface IBook extends IBookData, IEntityData {}
export interface ILoan extends ILoanData, IEntityData {}
export interface IReservation extends IReservationData, IEntityData {}

export enum EntityType {
    USERS = "USERS",
    BOOKS = "BOOKS",
    LOANS = "LOANS",
    RESERVATIONS = "RESERVATIONS",
}
export interface EntityDataMap {
    [EntityType.USERS]: IUserData;
    [EntityType.BOOKS]: IBookData;
    [EntityType.LOANS]: ILoanData;
    [EntityType.RESERVATIONS]: IReservationData;
}
export type StoredEntity<E extends EntityType> = EntityDataMap[E] & IEntityData;
export type EntityFilter<T> = {
    [field in keyof T]?: T[field] | T[field][];
};
export const ACTIVE_LOAN_STATUSES = [LoanStatus.ACTIVE, LoanStatus.OVERDUE];
export const ACTIVE_RESERVATION_STATUSES = [ReservationStatus.PENDING, ReservationStatus.NOTIFIED];

export abstract class BaseDataConnector {
    private criticalSection: Promise<unknown> = Promise.resolve();

    public abstract init(): Promise<void>;
    public abstract close(): Promise<void>;
    public abstract insert<E extends EntityType>(entity: E, row: EntityDataMap[E]): Promise<StoredEntity<E>>;
    public abstract get<E extends EntityType>(entity: E, id: number): Promise<StoredEntity<E> | undefined>;
    public abstract getAll<E extends EntityType>(entity: E, filter?: EntityFilter<StoredEntity<E>>): Promise<StoredEntity<E>[]>;
    public abstract update<E extends EntityType>(entity: E, id: number, newData: Partial<EntityDataMap[E]>): Promise<StoredEntity<E>>;
    public abstract remove(entity: EntityType, id: number): Promise<void>;
    /**
     * Runs `work` as one unit: either every write it makes through the given
     * connector is kept, or none is. Units never overlap.
     */
    public abstract atomic<T>(work: (connector: BaseDataConnector) => Promise<T>): Promise<T>;

    protected serialize<T>(work: () => Promise<T>): Promise<T> {
        const result = this.criticalSection.then(work);
        this.criticalSection = result.catch(() => undefined);
        return result;
    }

    public async insertUser(user: IUserData): Promise<IUser> {
        return this.insert(EntityType.USERS, user);
    }
    public async getUser(userId: number): Promise<IUser | undefined> {
        return this.get(EntityType.USERS, userId);
    }
    public async getUserByEmail(correo: string): Promise<IUser | undefined> {
        return (await this.getAll(EntityType.USERS, {correo}))[0];
    }
    public async getUsers(filter?: EntityFilter<IUser>): Promise<IUser[]> {
        return this.getAll(EntityType.USERS, filter);
    }
    public async updateUser(userId: number, newData: Partial<IUserData>): Promise<IUser> {
        return this.update(EntityType.USERS, userId, newData);
    }
    public async insertBook(book: IBookData): Promise<IBook> {
        return this.insert(EntityType.BOOKS, book);
    }
    public async getBook(bookId: number): Promise<IBook | undefined> {
        return this.get(EntityType.BOOKS, bookId);
    }
    public async getBooks(filter?: EntityFilter<IBook>): Promise<IBook[]> {
        return this.getAll(EntityType.BOOKS, filter);
    }
    public async updateBook(bookId: number, newData: Partial<IBookData>): Promise<IBook> {
        return this.update(EntityType.BOOKS, bookId, newData);
    }
    public async deleteBook(bookId: number): Promise<void> {
        return this.remove(EntityType.BOOKS, bookId);
    }
    public async insertLoan(loan: ILoanData): Promise<ILoan> {
        return this.insert(EntityType.LOANS, loan);
    }
    public async getLoan(loanId: number): Promise<ILoan | undefined> {
        return this.get(EntityType.LOANS, loanId);
    }
    public async getLoans(filter?: EntityFilter<ILoan>): Promise<ILoan[]> {
        return this.getAll(EntityType.LOANS, filter);
    }
    public async getActiveLoans(filter?: EntityFilter<ILoan>): Promise<ILoan[]> {
        return this.getAll(EntityType.LOANS, {...filter, estado: ACTIVE_LOAN_STATUSES});
    }
    public async updateLoan(loanId: number, newData: Partial<ILoanData>): Promise<ILoan> {
        return this.update(EntityType.LOANS, loanId, newData);
    }
    public async insertReservation(reservation: IReservationData): Promise<IReservation> {
        return this.insert(EntityType.RESERVATIONS, reservation);
    }
    public async getReservation(reservationId: number): Promise<IReservation | undefined> {
        return this.get(EntityType.RESERVATIONS, reservationId);
    }
    public async getReservations(filter?: EntityFilter<IReservation>): Promise<IReservation[]> {
        return this.getAll(EntityType.RESERVATIONS, filter);
    }
    /** Pending and notified reservations of a book, head of the queue first. */
    public async getReservationQueue(bookId: number): Promise<IReservation[]> {
        const reservations = await this.getAll(EntityType.RESERVATIONS, {libroId: bookId, estado: ACTIVE_RESERVATION_STATUSES});
        return reservations.sort((a, b) => a.prioridad - b.prioridad || a.fechaReserva.getTime() - b.fechaReserva.getTime() || a.id - b.id);
    }
    public async updateReservation(reservationId: number, newData: Partial<IReservationData>): Promise<IReservation> {
        return this.update(EntityType.RESERVATIONS, reservationId, newData);
    }
    public async deleteReservation(reservationId: number): Promise<void> {
        return this.remove(EntityType.RESERVATIONS, reservationId);
    }
    // TODO: move the grouping to the database layer for the Sequelize connector
    public async getLoanCountsByBook(): Promise<Map<number, number>> {
        const counts = new Map<number, number>();
        for (const loan of await this.getLoans()) {
            counts.set(loan.libroId, (counts.get(loan.libroId) || 0) + 1);
        }
        return counts;
    }
}
