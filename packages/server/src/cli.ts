import { getErrorMessage } from "@gradle-mcp/errors";
import { GradleWrapper, loadGradleConfigFromEnv } from "@gradle-mcp/gradle";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { parseArgs } from "./args.js";
import { LOG_PREFIX } from "./logging.js";
import { createGradleMcpServer, SERVER_NAME, SERVER_VERSION } from "./server.js";

function printHelp(): void {
  // stdout is free here: the server has not started
  process.stdout.write(`
${SERVER_NAME}: MCP server for Gradle builds (stdio transport)

Usage: ${SERVER_NAME} [options]

Options:
  --project-root <path>  Gradle project root (env: GRADLE_PROJECT_ROOT, default: cwd)
  --wrapper <path>       Gradle wrapper script (env: GRADLE_WRAPPER, default: <root>/gradlew)
  --version              Print the version
  --help                 Show this help message

Environment:
  GRADLE_TIMEOUT_MS      Kill runs that take longer than this
  GRADLE_CONSOLE         Gradle console mode: plain, auto, rich or verbose
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help) {
    printHelp();
    return;
  }
  if (args.version) {
    process.stdout.write(`${SERVER_VERSION}\n`);
    return;
  }

  const env = {
    ...process.env,
    ...(args.projectRoot ? { GRADLE_PROJECT_ROOT: args.projectRoot } : {}),
    ...(args.wrapper ? { GRADLE_WRAPPER: args.wrapper } : {}),
  };

  // Fail fast on a broken setup; tools re-resolve per call
  const config = loadGradleConfigFromEnv(env);
  console.error(`${LOG_PREFIX} Using Gradle wrapper ${config.wrapperPath}`);

  const server = createGradleMcpServer({
    resolveWrapper: () => new GradleWrapper(loadGradleConfigFromEnv(env)),
  });
  const transport = new StdioServerTransport();

  const shutdown = () => {
    void server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`${LOG_PREFIX} Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.connect(transport);
  console.error(`${LOG_PREFIX} ${SERVER_NAME} ${SERVER_VERSION} running on stdio`);
}

main().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} Fatal: ${getErrorMessage(error)}`);
  process.exit(1);
});
