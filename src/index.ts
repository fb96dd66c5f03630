import { buildAdvisorDeps, buildApp } from "./app";

const deps = buildAdvisorDeps();
const app = buildApp(deps);

async function main() {
  const port = Number(process.env.PORT ?? 3333);
  await app.listen({ port, host: "0.0.0.0" });
  deps.log.info(
    {
      evt: "server.listening",
      port,
      provider: deps.provider.name,
      routerMode: deps.config.router.mode,
      responseMode: deps.config.response.mode,
    },
    "server.listening"
  );
}

main().catch((err) => {
  deps.log.error({ evt: "server.start_failed", err: err instanceof Error ? err.message : String(err) }, "server.start_failed");
  process.exit(1);
});
