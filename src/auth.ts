import { Request, RequestHandler } from "express";
import { JsonWebTokenError, sign, verify } from "jsonwebtoken";
import { z } from "zod";
import { IUser, Role } from "./base-data-connector";
import { ApiError, apiErrors } from "./errors";
import { LibraryApiHelper } from "./library";

declare global {
    namespace Express {
        interface Request {
            requestId?: string;
            user?: IUser;
        }
    }
}

export interface ITokenClaims {
    correo: string;
    rol: Role;
    userId: number;
}

const claimsSchema = z.object({
    correo: z.string(),
    rol: z.nativeEnum(Role),
    userId: z.number().int(),
});

export const issueToken = (user: IUser, secret: string, expiresIn: number): string => {
    const claims: ITokenClaims = {correo: user.correo, rol: user.rol, userId: user.id};
    return sign(claims, secret, {algorithm: "HS256", expiresIn});
}

/** Claims of a token signed with `secret`; undefined when it is malformed, forged or expired. */
export const verifyToken = (token: string, secret: string): ITokenClaims | undefined => {
    try {
        const parsed = claimsSchema.safeParse(verify(token, secret, {algorithms: ["HS256"]}));
        return parsed.success ? parsed.data : undefined;
    } catch (error) {
        if (error instanceof JsonWebTokenError) {
            return;
        }
        throw error;
    }
}

export const authenticate = (libraryApiHelper: LibraryApiHelper): RequestHandler => (req, res, next) => {
    const authorization = req.headers.authorization || "";
    if (!authorization.startsWith("Bearer ")) {
        next(ApiError.fromCode(apiErrors.Unauthorized));
        return;
    }
    libraryApiHelper.authenticateToken(authorization.slice("Bearer ".length).trim()).then((user) => {
        if (!user) {
            next(ApiError.fromCode(apiErrors.Unauthorized));
            return;
        }
        req.user = user;
        next();
    }, next);
}

export const requireRole = (...roles: Role[]): RequestHandler => (req, res, next) => {
    if (!req.user) {
        next(ApiError.fromCode(apiErrors.Unauthorized, ["Autenticación requerida"]));
    } else if (!roles.includes(req.user.rol)) {
        next(ApiError.fromCode(apiErrors.Forbidden));
    } else {
        next();
    }
}

export const currentUser = (req: Request): IUser => {
    if (!req.user) {
        throw ApiError.fromCode(apiErrors.Unauthorized, ["Autenticación requerida"]);
    }
    return req.user;
}
