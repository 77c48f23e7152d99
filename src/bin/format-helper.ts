#!/usr/bin/env node

import { formatHelperMain } from "../main.js";
import { runMain } from "./run.js";

runMain(formatHelperMain());
