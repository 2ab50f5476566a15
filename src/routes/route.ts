import { Request, RequestHandler, Response } from "express";
import { logger } from "../logger";

/** Wraps an async handler: logs the call and hands any rejection to the error middleware. */
export const route = (name: string, handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
    (req, res, next) => {
        logger.info(`${req.requestId}: ${name} ${JSON.stringify(req.params)}`);
        handler(req, res).catch(next);
    };
