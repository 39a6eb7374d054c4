import { config } from "./config";
import { createApp } from "./app";
import { isSupabaseConfigured } from "./db/supabase";
import * as leads from "./db/leads";
import { createWeatherProvider } from "./services/enrichment";
import { createTextGenerator } from "./services/textGenerator";
import { createEmailSender } from "./services/delivery";

const app = createApp({
  store: leads,
  pipeline: {
    weatherProvider: createWeatherProvider(config),
    generator: createTextGenerator(config),
    useAi: config.useAi,
    timeoutMs: config.aiTimeoutMs,
  },
  emailSender: createEmailSender(config),
  operatorApiKey: config.operatorApiKey,
});

// Start server
app.listen(config.port, () => {
  console.log(`[server] Lead Outreach Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Database: ${isSupabaseConfigured() ? "supabase" : "in-memory"}`);
  console.log(`[server] AI outreach: ${config.useAi && config.openaiApiKey ? config.openaiModel : "template only"}`);
});

export default app;
