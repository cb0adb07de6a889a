// src/types/run-config.ts
import { z } from "zod";
import { RunConfigSchema } from "../models/run-config.js";

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
