import { Router } from "express";
import { authenticate, requireRole } from "../auth";
import { Role } from "../base-data-connector";
import { LibraryApiHelper } from "../library";
import { bookFilterSchema, createBookSchema, parse, parseId, updateBookSchema } from "../validation";
import { route } from "./route";

export const createBooksRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();
    const staffOnly = requireRole(Role.LIBRARIAN, Role.ADMIN);

    router.use(authenticate(libraryApiHelper));

    router.get("/", route("listBooks", async (req, res) => {
        res.send(await libraryApiHelper.listBooks(parse(bookFilterSchema, req.query)));
    }));

    router.get("/:id", route("getBook", async (req, res) => {
        res.send(await libraryApiHelper.getBook(parseId(req.params.id)));
    }));

    router.post("/", staffOnly, route("createBook", async (req, res) => {
        const book = await libraryApiHelper.createBook(parse(createBookSchema, req.body));
        res.status(201).send(book);
    }));

    router.put("/:id", staffOnly, route("updateBook", async (req, res) => {
        res.send(await libraryApiHelper.updateBook(parseId(req.params.id), parse(updateBookSchema, req.body)));
    }));

    router.delete("/:id", staffOnly, route("deleteBook", async (req, res) => {
        await libraryApiHelper.deleteBook(parseId(req.params.id));
        res.status(204).end();
    }));

    return router;
}
