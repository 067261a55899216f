import type { HttpBindings } from "@hono/node-server";
import type { RequestContext } from "./context.js";

export interface AppEnv {
  Bindings: HttpBindings;
  Variables: {
    requestContext: RequestContext | undefined;
  };
}
