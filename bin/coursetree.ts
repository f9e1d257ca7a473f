#!/usr/bin/env -S npx tsx
import { CLI } from "../lib/course/cli.ts";

process.exitCode = await CLI.instance().run();
