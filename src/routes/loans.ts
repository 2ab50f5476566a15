import { Router } from "express";
import { authenticate, currentUser, requireRole } from "../auth";
import { Role } from "../base-data-connector";
import { LibraryApiHelper } from "../library";
import { createLoanSchema, loanFilterSchema, parse, parseId } from "../validation";
import { route } from "./route";

export const createLoansRouter = (libraryApiHelper: LibraryApiHelper) => {
    const router = Router();

    router.use(authenticate(libraryApiHelper));

    router.get("/", route("listLoans", async (req, res) => {
        res.send(await libraryApiHelper.listLoans(currentUser(req), parse(loanFilterSchema, req.query)));
    }));

    router.get("/vencidos", requireRole(Role.LIBRARIAN, Role.ADMIN), route("getOverdueLoans", async (req, res) => {
        res.send(await libraryApiHelper.getOverdueLoans());
    }));

    router.post("/", route("createLoan", async (req, res) => {
        const loan = await libraryApiHelper.createLoan(currentUser(req), parse(createLoanSchema, req.body));
        res.status(201).send(loan);
    }));

    router.put("/:id/devolver", route("returnLoan", async (req, res) => {
        res.send(await libraryApiHelper.returnLoan(currentUser(req), parseId(req.params.id)));
    }));

    router.put("/:id/renovar", route("renewLoan", async (req, res) => {
        res.send(await libraryApiHelper.renewLoan(currentUser(req), parseId(req.params.id)));
    }));

    return router;
}
