#!/usr/bin/env node
import { runMain } from "citty";
import { main } from "./commands/index.js";

await runMain(main);
