// Lambda handler for the scheduled nickel bulletin (Node.js).
// Thin wrapper: loads configuration and delegates to the bulletin engine.

import { createBulletinEngine } from "@src/bulletin/application/bulletin_engine";
import { loadBulletinConfig } from "@src/bulletin/config";
import { withRequestContext } from "@src/util/logger";

interface LambdaContextLike {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

/**
 * AWS Lambda entrypoint.
 */
export const handler = async (_event?: unknown, context: LambdaContextLike = {}) => {
  const logger = withRequestContext("functions/nickel_bulletin", context);
  const config = loadBulletinConfig();
  const engine = createBulletinEngine(config, { logger });

  const result = await engine.run();

  return {
    statusCode: 200,
    body: JSON.stringify({
      status: "ok",
      alertTier: result.composite.alertTier,
      degradedToError: result.degradedToError,
      delivered: result.delivery.ok,
      deliveryError: result.delivery.ok ? undefined : result.delivery.error.message,
    }),
  };
};
