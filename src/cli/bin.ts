#!/usr/bin/env node
import { main } from "./index";

main().catch((error: unknown) => {
	process.stderr.write(`${String(error)}\n`);
	process.exit(1);
});
