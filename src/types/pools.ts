// src/types/pools.ts
import { z } from "zod";
import { ValuePoolsSchema } from "../models/pools.js";

export type ValuePools = z.infer<typeof ValuePoolsSchema>;
