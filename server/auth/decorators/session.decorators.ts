import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import type { Request } from "express";
import type { Identity } from "../types.js";

/** Roles held by the current session (empty when anonymous). */
export const SessionRoles = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string[] =>
    context.switchToHttp().getRequest<Request>().session?.auth?.roles ?? [],
);

/** Identity of the current session, or undefined when anonymous. */
export const SessionIdentity = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Identity | undefined =>
    context.switchToHttp().getRequest<Request>().session?.auth?.identity,
);
