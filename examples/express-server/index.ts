/**
 * initex/examples/express-server/index.ts
 *
 * Serves the extractor over HTTP with Express.
 *
 * How to run (from repo root):
 *   npm run example:server
 *
 * Then:
 *   curl -s localhost:3000/api/extract \
 *     -H 'Content-Type: application/json' \
 *     -d '{"operation":"evaluate","source":"GEN_9 >= GEN_6 ? 65 : 60"}'
 */

import express from 'express';
import { createExtractionMiddleware, createExtractor, describeSkip, formatExtractorError } from '../../src';

const PORT = Number(process.env.PORT ?? 3000);

const extractor = createExtractor({
  symbols: { GEN_3: 3, GEN_6: 6, GEN_9: 9, STANDARD_FRIENDSHIP: 50 },
  maxInputLength: 512 * 1024,
  onSkip: (skip) => console.warn(describeSkip(skip)),
});

const app = express();
app.use(express.json({ limit: '1mb' }));

app.post(
  '/api/extract',
  createExtractionMiddleware({
    extractor,
    maxWireSourceLength: 512 * 1024,
    onError: (err) => console.error(formatExtractorError(err).summary),
  }),
);

app.get('/health', (_req, res) => {
  res.json({ ok: true });
});

app.listen(PORT, () => {
  console.log(`initex example server listening on http://localhost:${PORT}`);
});
