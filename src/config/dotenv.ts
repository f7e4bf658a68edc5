import dotenv from "dotenv";

// Imported ahead of anything that reads the environment at module load, such as the logger.
dotenv.config();
