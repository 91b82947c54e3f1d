#!/usr/bin/env node

import { main } from "./index.js";

main().catch((error) => {
  console.error("acp-gateway: fatal error:", error);
  process.exit(1);
});
