import BigNumber from "bignumber.js";
import { z } from "zod";
import { BookStatus, LoanStatus, ReservationStatus, Role } from "./base-data-connector";
import { ApiError, apiErrors, ErrorDetails } from "./errors";
import { FineAction } from "./library";

const text = (max: number) => z.string().trim().min(1).max(max);

// path and query ids: plain decimal digits only
const id = z.string().regex(/^\d+$/).transform(Number).pipe(z.number().int().positive());

export const registerSchema = z.object({
    nombre: text(100),
    apellido: text(100),
    correo: z.string().trim().toLowerCase().email(),
    "contraseña": z.string().min(6),
    edad: z.number().int().min(0).max(150),
    numeroIdentidad: text(50),
    telefono: text(20),
});

export const loginSchema = z.object({
    correo: z.string().trim().toLowerCase().min(1),
    "contraseña": z.string().min(1),
});

export const createBookSchema = z.object({
    titulo: text(200),
    autor: text(100),
    isbn: text(20),
    categoria: text(100),
    editorial: text(100),
    anioPublicacion: z.number().int().min(0).max(9999),
    copiasTotal: z.number().int().min(0),
    copiasDisponibles: z.number().int().min(0).optional(),
    ubicacion: text(100),
    estado: z.nativeEnum(BookStatus).optional(),
    descripcion: z.string().optional(),
});

export const updateBookSchema = createBookSchema.partial();

export const bookFilterSchema = z.object({
    categoria: z.string().optional(),
    autor: z.string().optional(),
    titulo: z.string().optional(),
    disponible: z.enum(["true", "false"]).optional().transform((value) => value === undefined ? undefined : value === "true"),
});

export const createLoanSchema = z.object({
    libro: z.number().int().positive(),
    fechaDevolucionEsperada: z.coerce.date().optional(),
    usuario: z.number().int().positive().optional(),
});

export const loanFilterSchema = z.object({
    usuario: id.optional(),
    estado: z.nativeEnum(LoanStatus).optional(),
});

export const createReservationSchema = z.object({
    libro: z.number().int().positive(),
});

export const reservationFilterSchema = z.object({
    libro: id.optional(),
    estado: z.nativeEnum(ReservationStatus).optional(),
});

export const popularBooksSchema = z.object({
    limite: z.coerce.number().int().min(1).max(100).default(10),
});

export const changeRoleSchema = z.object({
    rol: z.nativeEnum(Role),
});

export const manageFineSchema = z.object({
    accion: z.nativeEnum(FineAction),
    monto: z.coerce.string()
        .regex(/^\d+(\.\d{1,2})?$/, "Debe ser un monto con hasta dos decimales")
        .refine((value) => new BigNumber(value).isGreaterThan(0), "Debe ser mayor que cero")
        .optional(),
});

/** Parses `data` or throws a 400 naming every offending field. */
export const parse = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, reason?: string): T => {
    const result = schema.safeParse(data);
    if (result.success) {
        return result.data;
    }
    const details: ErrorDetails = {};
    for (const issue of result.error.issues) {
        const field = issue.path.join(".") || "_";
        details[field] = [...(details[field] || []), issue.message];
    }
    throw ApiError.fromCode(apiErrors.BadRequest, reason ? [reason] : [], details);
}

export const parseId = (value: string): number => {
    const result = id.safeParse(value);
    if (!result.success) {
        throw ApiError.fromCode(apiErrors.BadRequest, ["Identificador inválido"]);
    }
    return result.data;
}
