import { Router } from "express";
import { z } from "zod";
import { applyEnvChanges, writeEnvFile } from "../credentials";
import { ValidationError } from "../errors";
import { log } from "../helpers/log.helper";
import { sessionOf } from "./auth";
import { applyListChanges, writeDomainList } from "../proxiedDomains";
import type { AppState } from "../store";

const name = z.string().trim().min(1);

const ChangeSetSchema = z.object({
  del: z.array(name).default([]),
  upd: z.array(z.object({ original: name, name, value: z.string().optional() })).default([]),
  add: z.array(z.object({ name, value: z.string().optional() })).default([]),
});

const SettingsBodySchema = z
  .object({
    apiKeys: ChangeSetSchema.optional(),
    engines: ChangeSetSchema.optional(),
    proxiedDomains: ChangeSetSchema.optional(),
  })
  .refine((b) => Boolean(b.apiKeys || b.engines || b.proxiedDomains), "Nothing to change");

/** Settings page API. Secret values are write-only: only names are returned. */
export function adminRouter(state: AppState): Router {
  const router = Router();

  const settings = () => ({
    apiKeys: state.credentials.apiKeys.map((k) => k.name),
    engines: state.credentials.engines.map((e) => e.name),
    proxiedDomains: state.proxiedDomains,
  });

  router.get("/settings", (_req, res) => {
    res.json({ ok: true, settings: settings() });
  });

  router.post("/settings", async (req, res, next) => {
    try {
      const parsed = SettingsBodySchema.safeParse(req.body);
      if (!parsed.success) throw new ValidationError("Invalid settings change", parsed.error.flatten());
      const { apiKeys, engines, proxiedDomains } = parsed.data;

      // validate every change set before touching any file
      const nextKeys = apiKeys && applyEnvChanges(state.credentials.apiKeys, apiKeys);
      const nextEngines = engines && applyEnvChanges(state.credentials.engines, engines);
      const nextDomains = proxiedDomains && applyListChanges(state.proxiedDomains, proxiedDomains);

      if (nextKeys) await writeEnvFile(state.paths.apiKeys, nextKeys);
      if (nextEngines) await writeEnvFile(state.paths.engines, nextEngines);
      if (nextKeys || nextEngines) await state.reloadCredentials();
      if (nextDomains) {
        await writeDomainList(state.paths.proxiedDomains, nextDomains);
        await state.reloadProxiedDomains();
      }

      log.info(`Settings updated by ${sessionOf(res)?.username ?? "unknown"}`);
      res.json({ ok: true, settings: settings() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
