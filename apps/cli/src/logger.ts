import bunyan from "bunyan";

export const LOG_LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

// stdout belongs to Ink and to command output; log records go to stderr.
const log = bunyan.createLogger({
  name: "tictacfoe",
  level: "info",
  stream: process.stderr,
});

export default log;
