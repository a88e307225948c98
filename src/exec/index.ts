export { execaExecutor, runCommand, SPAWN_FAILURE_EXIT_CODE } from "./client";
