import { fileURLToPath } from "node:url";
import { config } from "./config/index.js";
import { buildApp } from "./app.js";

export async function bootstrap(): Promise<void> {
  const app = await buildApp({ lifecycle: { enableBootstrap: config.ENABLE_INFRA_BOOTSTRAP } });
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    console.error("Server startup failed", error);
    process.exitCode = 1;
  });
}
