import { runCli } from "../../src/index.js";
import { project } from "./project.js";

await runCli(project);
