/**
 * Newsdesk Report API
 *
 * Read-only REST API over the pipeline's output directory.
 */

import 'dotenv/config';
import { createApp } from './app.js';

const PORT = Number(process.env.PORT) || 3300;
const OUTPUT_DIR = process.env.OUTPUT_DIR || 'output';

const app = createApp(OUTPUT_DIR);

app.listen(PORT, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║                     📰  NEWSDESK                          ║
║                 Pipeline Report API                       ║
║                                                           ║
║   Server running at http://localhost:${PORT}               ║
║   Serving artifacts from ./${OUTPUT_DIR}
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
  `);
});

export default app;
