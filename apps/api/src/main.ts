import "reflect-metadata";
import { createApiApp, resolvePort } from "./bootstrap";
import { apiLogger } from "./observability/logger";

const bootstrap = async () => {
  const app = await createApiApp();
  const port = resolvePort(process.env.PORT);

  await app.listen({ port, host: "0.0.0.0" });
  apiLogger.info({ event: "bootstrap.complete", port }, "CTF arena API running");
};

bootstrap().catch((error: unknown) => {
  apiLogger.fatal({ event: "bootstrap.failed", err: error }, "API failed to start");
  process.exit(1);
});
