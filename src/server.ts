// src/server.ts

import { createApp, createStores } from './app';
import { loadConfig } from './config';

const { PORT } = loadConfig();
const app = createApp(createStores());

// Start server
app.listen(PORT, () => {
    console.log(`Triage service running on port ${PORT}`);
});
