/**
 * Request logging
 *
 * One line per finished request with status, body size and elapsed time.
 * Client errors go to console.warn, server errors to console.error.
 */

import type { RequestHandler } from 'express';

export function requestLogger(tag = 'ReportAPI'): RequestHandler {
    return (req, res, next) => {
        const started = process.hrtime.bigint();

        res.on('finish', () => {
            const elapsedMs = Number(process.hrtime.bigint() - started) / 1e6;
            const size = res.get('Content-Length') ?? '-';
            const line = `[${tag}] ${req.method} ${req.originalUrl} ${res.statusCode} ${size}b ${elapsedMs.toFixed(1)}ms`;

            if (res.statusCode >= 500) {
                console.error(line);
            } else if (res.statusCode >= 400) {
                console.warn(line);
            } else {
                console.log(line);
            }
        });

        next();
    };
}
