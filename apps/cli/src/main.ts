#!/usr/bin/env node
import { asErrorMessage } from "@stagewatch/core";
import { createProgram } from "./program.js";

void createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(asErrorMessage(error));
    process.exitCode = 1;
  });
