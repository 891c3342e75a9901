#!/usr/bin/env node
import { runForgeCli } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());
process.once("SIGTERM", () => controller.abort());

process.exitCode = await runForgeCli({ signal: controller.signal });
