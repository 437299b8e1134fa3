import { createApp } from "../src/app";

// Serverless entry: the platform invokes the exported app once per request.
const app = createApp();

export default app;
