#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { main } from "./app.js";
import { errorMessage } from "./errors.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

main(process.argv, { env: process.env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  });
