#!/usr/bin/env node

import { checkCommitLogsMain } from "../main.js";
import { runMain } from "./run.js";

runMain(checkCommitLogsMain());
