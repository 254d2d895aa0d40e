/**
 * Basic server example: shared state, path parameters and the 404 fallback.
 *
 * Run with:
 *   npx tsx examples/basic.ts
 */

import {
  createLogger,
  loadConfig,
  path,
  Router,
  serve,
} from "../mod.ts";

interface ServerState {
  startedAt: Date;
  visits: { count: number };
}

const config = loadConfig();
const logger = createLogger({
  name: "example",
  level: config.logLevel,
  json: config.logJson,
});

const users = path("/users/:id");
const repos = path("/orgs/:orgId/repos/:repoId");

const router = Router.withState<ServerState>({
  startedAt: new Date(),
  visits: { count: 0 },
})
  .get(path("/"), (_req, state) => {
    state.visits.count += 1;
    return Response.json({
      message: "Welcome to Waymark!",
      visits: state.visits.count,
      since: state.startedAt.toISOString(),
    });
  })
  .get(users, (req) => {
    const id = users.exec(req.url)?.params.id;
    return Response.json({ userId: id, name: `User ${id}` });
  })
  .get(repos, (req) => {
    const params = repos.exec(req.url)?.params ?? {};
    return Response.json({
      organization: params.orgId,
      repository: params.repoId,
    });
  })
  .post(path("/users"), async (req) => {
    const body: unknown = await req.json();
    return Response.json({ created: true, body }, { status: 201 });
  })
  .delete(users, () => new Response(null, { status: 204 }));

const handle = await serve(router, {
  port: config.port,
  hostname: config.hostname,
  development: config.development,
  logger,
  onListen: ({ port }) => {
    logger.info("Try these endpoints:");
    logger.info(`  GET  http://localhost:${port}/`);
    logger.info(`  GET  http://localhost:${port}/users/123`);
    logger.info(`  GET  http://localhost:${port}/orgs/waymark/repos/router`);
    logger.info(`  POST http://localhost:${port}/users`);
  },
});

process.once("SIGINT", () => {
  handle.close().catch((error: unknown) => {
    logger.error("Failed to stop server", { error });
    process.exitCode = 1;
  });
});
