import dotenv from "dotenv";
dotenv.config();

export * from "./battleSystem";
