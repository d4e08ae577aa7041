import { Router } from "express";
import { z } from "zod";
import { RosterService } from "../../services/rosterService";
import { parseInput, sendError } from "../respond";

const cellValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const personBody = z.object({ data: z.array(cellValue) });
const questionBody = z.object({ question: z.string().trim().min(1, "Question is required") });
const photoBody = z.object({ url: z.string().url() });
const columnBody = z.object({ name: z.string().trim().min(1, "Column name is required") });
// Row 1 is the header
const rowParam = z.coerce.number().int().min(2, "Row must be 2 or greater");

/**
 * Mini-app API: thin pass-throughs to the roster service.
 * Rows are addressed by their sheet row number (`row_index`).
 */
export function createMiniAppRouter(roster: RosterService): Router {
  const router = Router();

  // GET /api/miniapp/headers
  router.get("/headers", async (req, res) => {
    try {
      res.json(await roster.getHeaders());
    } catch (error) {
      sendError(res, error, "fetch headers");
    }
  });

  // GET /api/miniapp/people - every record, keyed by header, with row_index
  router.get("/people", async (req, res) => {
    try {
      res.json(await roster.listPeople());
    } catch (error) {
      sendError(res, error, "fetch people");
    }
  });

  // GET /api/miniapp/birthdays - month number to that month's birthdays
  router.get("/birthdays", async (req, res) => {
    try {
      const byMonth = await roster.birthdays();
      res.json(Object.fromEntries(byMonth));
    } catch (error) {
      sendError(res, error, "fetch birthdays");
    }
  });

  // GET /api/miniapp/homerooms - group name to members, configured groups first
  router.get("/homerooms", async (req, res) => {
    try {
      const groups = await roster.homerooms();
      res.json(Object.fromEntries(groups.map((group) => [group.name, group.members])));
    } catch (error) {
      sendError(res, error, "fetch homerooms");
    }
  });

  // POST /api/miniapp/ask
  router.post("/ask", async (req, res) => {
    try {
      const { question } = parseInput(questionBody, req.body);
      const answer = await roster.ask(question);
      if (!answer) {
        return res.json({ answer: "База данных пуста." });
      }
      res.json({ answer: answer.text, source: answer.source });
    } catch (error) {
      sendError(res, error, "answer question");
    }
  });

  // POST /api/miniapp/person - append a record
  router.post("/person", async (req, res) => {
    try {
      const { data } = parseInput(personBody, req.body);
      const rowIndex = await roster.createPerson(data);
      res.status(201).json({ success: true, row_index: rowIndex });
    } catch (error) {
      sendError(res, error, "create person");
    }
  });

  // POST /api/miniapp/person/:row - overwrite a record
  router.post("/person/:row", async (req, res) => {
    try {
      const row = parseInput(rowParam, req.params.row);
      const { data } = parseInput(personBody, req.body);
      await roster.updatePerson(row, data);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "update person");
    }
  });

  // DELETE /api/miniapp/person/:row
  router.delete("/person/:row", async (req, res) => {
    try {
      const row = parseInput(rowParam, req.params.row);
      await roster.deletePerson(row);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "delete person");
    }
  });

  // POST /api/miniapp/person/:row/photo - store a photo reference
  router.post("/person/:row/photo", async (req, res) => {
    try {
      const row = parseInput(rowParam, req.params.row);
      const { url } = parseInput(photoBody, req.body);
      await roster.setPhoto(row, url);
      res.json({ success: true, url });
    } catch (error) {
      sendError(res, error, "store photo");
    }
  });

  // POST /api/miniapp/columns
  router.post("/columns", async (req, res) => {
    try {
      const { name } = parseInput(columnBody, req.body);
      const added = await roster.addColumn(name);
      if (!added) {
        return res.status(409).json({ error: `Column "${name}" already exists` });
      }
      res.status(201).json({ success: true });
    } catch (error) {
      sendError(res, error, "add column");
    }
  });

  // DELETE /api/miniapp/columns/:name
  router.delete("/columns/:name", async (req, res) => {
    try {
      await roster.deleteColumn(req.params.name);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, "delete column");
    }
  });

  // GET /api/miniapp/config - choice lists and date columns for the client's forms
  router.get("/config", (req, res) => {
    res.json(roster.clientConfig());
  });

  return router;
}
