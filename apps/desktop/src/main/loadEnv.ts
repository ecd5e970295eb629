// Imported first by the entry point so every module below sees the expanded environment.
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

dotenvExpand.expand(dotenv.config());
