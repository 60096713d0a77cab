import "dotenv/config";
import runApp from "./app";

runApp();
