/**
 * Command Resolver: maps an AdminCommand onto the HTTP request that performs it.
 *
 * Pure: no I/O, same inputs give an equal descriptor.
 */

import {
  ConfigurationError,
  ErrorCode,
  type AdminCommand,
  type EndpointConfig,
  type HttpMethod,
  type RequestDescriptor,
} from "@dgraph-admin/sdk";
import { ADMIN_PATHS, CONTENT_TYPES, type DropOperation } from "./paths.js";

/**
 * @throws ConfigurationError when update-schema carries no schema text.
 */
export function resolveCommand(command: AdminCommand, config: EndpointConfig): RequestDescriptor {
  switch (command.kind) {
    case "update-schema": {
      const schema = command.schema;
      if (schema === undefined || schema.trim() === "") {
        throw new ConfigurationError("Schema payload is empty; nothing to update", {
          code: ErrorCode.EMPTY_SCHEMA,
        });
      }
      return buildDescriptor(config, "POST", ADMIN_PATHS.alter, {
        body: schema,
        contentType: CONTENT_TYPES.dql,
      });
    }
    case "get-schema":
      return buildDescriptor(config, "GET", ADMIN_PATHS.schema);
    case "drop-all":
      return dropDescriptor(config, "all");
    case "drop-data":
      return dropDescriptor(config, "data");
    case "get-health":
      return buildDescriptor(config, "GET", ADMIN_PATHS.health);
    default: {
      const unknown: never = command;
      throw new ConfigurationError(`Unknown admin command: ${JSON.stringify(unknown)}`);
    }
  }
}

function dropDescriptor(config: EndpointConfig, op: DropOperation): RequestDescriptor {
  return buildDescriptor(config, "POST", ADMIN_PATHS.alter, {
    body: JSON.stringify({ drop_op: op }),
    contentType: CONTENT_TYPES.json,
  });
}

function buildDescriptor(
  config: EndpointConfig,
  method: HttpMethod,
  path: string,
  payload?: { body: string; contentType: string },
): RequestDescriptor {
  const headers: Record<string, string> = {};
  if (payload) {
    headers["Content-Type"] = payload.contentType;
  }
  // Added last so an operator-chosen name always goes out as given.
  if (config.authHeader) {
    headers[config.authHeader.name] = config.authHeader.value;
  }

  return Object.freeze({
    method,
    path,
    headers: Object.freeze(headers),
    ...(payload ? { body: payload.body } : {}),
  });
}
