import express from "express";
import type { Actor } from "../types/crud";

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export type ActorResolver = (req: express.Request) => Actor | null | Promise<Actor | null>;

export const anonymousActor: Actor = Object.freeze({ roles: [] });

const headerList = (value: string | undefined) =>
  (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

// Trusts request headers; intended for the demo app only.
export const headerActorResolver: ActorResolver = (req) => {
  const id = req.header("x-crud-user");
  const roles = headerList(req.header("x-crud-roles"));
  const permissions = headerList(req.header("x-crud-permissions"));
  const isSuperuser = req.header("x-crud-superuser") === "true";
  if (!id && roles.length === 0 && permissions.length === 0 && !isSuperuser) {
    return null;
  }
  return { ...(id ? { id } : {}), roles, permissions, isSuperuser };
};

export const attachActor = (resolver: ActorResolver = headerActorResolver): express.RequestHandler => {
  return async (req, _res, next) => {
    try {
      req.actor = (await resolver(req)) ?? anonymousActor;
      next();
    } catch (error) {
      next(error);
    }
  };
};
