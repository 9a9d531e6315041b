#!/usr/bin/env node
import { createCli } from "./program.js";

void createCli().runExit(process.argv.slice(2));
