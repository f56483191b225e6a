/**
 * Query API
 *
 * Read-only API for persisted Lohnjournal periods and the spreadsheet export.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  config,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  loadLayout,
  type ErrorEnvelope,
  type TableSchema,
} from '@lohnjournal/shared';
import { listPeriods, findPeriod, getPeriodRows, getEmployeeHistory, loadAllPeriodRows, database } from './lib/db';
import { buildWorkbook } from './lib/export';
import { parseMonthParam } from './lib/params';

const app = express();
const port = config.queryApiPort;

const profile = loadLayout(config.layoutVersion);
const schema: TableSchema = { fields: profile.fields, identifierField: profile.identifierField };

function errorEnvelope(code: string, message: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: getCorrelationId() } };
}

// Middleware
app.use(express.json());

// Correlation ID middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && /^[\w-]{1,64}$/.test(header) ? header : ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
});

// Request timing middleware
app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const route: unknown = req.route;
    const path =
      route !== null && typeof route === 'object' && 'path' in route && typeof route.path === 'string'
        ? route.path
        : req.path;

    httpRequestDurationHistogram.observe({ method: req.method, path, status: res.statusCode.toString() }, duration);
    httpRequestsCounter.inc({ method: req.method, path, status: res.statusCode.toString() });

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
});

// Health check
app.get('/health', async (req: Request, res: Response) => {
  try {
    // Test database connection
    await database.query('SELECT 1');

    res.json({
      status: 'healthy',
      service: 'query-api',
      database: 'connected',
      layout_version: profile.version,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    res.status(503).json({
      status: 'unhealthy',
      service: 'query-api',
      database: 'disconnected',
      error: error instanceof Error ? error.message : 'Unknown error',
      timestamp: new Date().toISOString(),
    });
  }
});

// Metrics endpoint
app.get('/metrics', async (req: Request, res: Response) => {
  try {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  } catch (error) {
    logger.error('Metrics scrape failed', error);
    res.status(500).end();
  }
});

/**
 * GET /periods
 * Persisted reporting periods, oldest first
 */
app.get('/periods', async (req: Request, res: Response) => {
  try {
    res.json({ items: await listPeriods() });
  } catch (error) {
    logger.error('Failed to list periods', error);
    res.status(500).json(errorEnvelope('internal_error', 'Failed to list periods'));
  }
});

/**
 * GET /periods/:year/:month/rows
 * Rows of one period; month is 1-12 or a German month name
 */
app.get('/periods/:year/:month/rows', async (req: Request, res: Response) => {
  const { year, month } = req.params;
  const parsed = parseMonthParam(year, month);

  if (!parsed) {
    res.status(400).json(errorEnvelope('invalid_request', `Unknown period ${month} ${year}`));
    return;
  }

  try {
    const period = await findPeriod(parsed.year, parsed.monthNumber);
    if (!period) {
      res.status(404).json(errorEnvelope('not_found', `Period ${month} ${year} not found`));
      return;
    }

    const rows = await getPeriodRows(period, schema);
    res.json({ period, items: rows });
  } catch (error) {
    logger.error('Failed to get period rows', error, { year, month });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to retrieve period rows'));
  }
});

/**
 * GET /employees/:persNr
 * One employee's rows across all periods
 */
app.get('/employees/:persNr', async (req: Request, res: Response) => {
  const { persNr } = req.params;

  if (!profile.identifierPattern.test(persNr)) {
    res.status(400).json(errorEnvelope('invalid_request', `Invalid personnel number ${persNr}`));
    return;
  }

  try {
    const rows = await getEmployeeHistory(persNr, schema);
    if (rows.length === 0) {
      res.status(404).json(errorEnvelope('not_found', `Employee ${persNr} not found`));
      return;
    }

    res.json({ pers_nr: persNr, items: rows });
  } catch (error) {
    logger.error('Failed to get employee', error, { persNr });
    res.status(500).json(errorEnvelope('internal_error', 'Failed to retrieve employee'));
  }
});

/**
 * GET /export.xlsx
 * Workbook with a summary sheet and one sheet per period
 */
app.get('/export.xlsx', async (req: Request, res: Response) => {
  try {
    const periods = await loadAllPeriodRows(schema);
    const workbook = buildWorkbook(periods, schema);

    res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    res.setHeader('Content-Disposition', 'attachment; filename="lohnjournal.xlsx"');
    await workbook.xlsx.write(res);
    res.end();

    logger.info('Workbook exported', { periods: periods.length });
  } catch (error) {
    logger.error('Failed to export workbook', error);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    res.status(500).json(errorEnvelope('internal_error', 'Failed to export workbook'));
  }
});

// Start server
const server = app.listen(port, () => {
  logger.info('Query API started', { port });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await database.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
