export enum apiErrors {
    BadRequest = 400,
    Unauthorized = 401,
    Forbidden = 403,
    NotFound = 404,
    InternalError = 500,
}

export const errorTemplates: {[errorType in apiErrors]: (...args: string[]) => string} = {
    400: (reason?: string) => reason || "Datos inválidos",
    401: (reason?: string) => reason || "Token JWT inválido o expirado",
    403: (reason?: string) => reason || "No tiene permisos para realizar esta acción",
    404: (entityType: string, entityId: string) => `${entityType} (${entityId}) no existe`,
    500: () => "Error interno del servidor",
}

export type ErrorDetails = {[field: string]: string[]};

export class ApiError extends Error {
    public code: apiErrors;
    public details?: ErrorDetails;
    constructor(errorCode: apiErrors, args: string[] = [], details?: ErrorDetails) {
        super(errorTemplates[errorCode](...args));
        this.name = "ApiError";
        this.code = errorCode;
        this.details = details;
    }
    public toJSON() {
        return this.details ? { error: this.message, detalles: this.details } : { error: this.message };
    }
    static fromCode = (code: apiErrors, args?: string[], details?: ErrorDetails) => new ApiError(code, args, details)
}
