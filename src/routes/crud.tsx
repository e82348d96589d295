import express from "express";
import { crudUrlPatterns, normalizeBasePath } from "../lib/urls";
import type { CrudRoute } from "../lib/urls";
import { anonymousActor } from "../middlewares/actor";
import type { CrudHandler } from "../services/crudService";
import { ServiceError } from "../services/serviceError";
import { defaultLayout, renderDocument } from "../templates/layout";
import type { PageLayout } from "../templates/layout";
import MessageView from "../templates/messageTemplate";
import type { CrudResult, SubmittedValues } from "../types/crud";

type CrudRouteOptions = {
  namePrefix?: string;
  layout?: PageLayout;
};

const messageTitles: Record<number, string> = {
  403: "Forbidden",
  404: "Not Found"
};

const toSubmittedValues = (body: unknown): SubmittedValues => {
  if (!body || typeof body !== "object" || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
};

const sendResult = (res: express.Response, result: CrudResult, layout: PageLayout, framework: string) => {
  switch (result.kind) {
    case "page":
      res.status(result.status).type("html").send(result.html);
      return;
    case "redirect":
      res.redirect(result.status, result.location);
      return;
    default: {
      const title = messageTitles[result.status] ?? "Error";
      const content = <MessageView title={title} message={result.message} />;
      res.status(result.status).type("html").send(renderDocument(layout({ title, framework, children: content })));
    }
  }
};

export const registerCrudRoutes = (
  app: express.Express,
  prefix: string,
  handler: CrudHandler,
  options: CrudRouteOptions = {}
): CrudRoute[] => {
  const routes = crudUrlPatterns(prefix, options.namePrefix);
  const basePath = normalizeBasePath(prefix);
  const layout = options.layout ?? defaultLayout;
  const parseForm = express.urlencoded({ extended: false });

  routes.forEach((route) => {
    const serve: express.RequestHandler = async (req, res, next) => {
      try {
        const result = await handler({
          action: route.action,
          pk: req.params.pk,
          method: req.method === "POST" ? "POST" : "GET",
          actor: req.actor ?? anonymousActor,
          query: req.query,
          body: toSubmittedValues(req.body),
          basePath
        });
        sendResult(res, result, layout, handler.renderer.name);
      } catch (error) {
        if (error instanceof ServiceError) {
          res.status(error.status).json({ error: error.message });
          return;
        }
        console.error(`Failed to serve ${route.name}`, error);
        next(error);
      }
    };

    app.get(route.path, serve);
    app.post(route.path, parseForm, serve);
  });

  return routes;
};
