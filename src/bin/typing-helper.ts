#!/usr/bin/env node

import { typingHelperMain } from "../main.js";
import { runMain } from "./run.js";

runMain(typingHelperMain());
