import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import cors from 'cors';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../config';

function clientIp(req: Request): string {
	// Strip the IPv4-mapped IPv6 prefix
	return (req.ip || req.socket.remoteAddress || '').replace(/^::ffff:/, '');
}

function isBypassed(req: Request): boolean {
	const ip = clientIp(req);
	return config.security.bypassIPs.some(bypassIp =>
		bypassIp === 'localhost' ? ip === '127.0.0.1' || ip === '::1' : ip === bypassIp
	);
}

// Runs the middleware only when security is enabled and the caller is not on the bypass list
function whenEnabled(middleware: RequestHandler): RequestHandler {
	return (req: Request, res: Response, next: NextFunction) => {
		if (!config.security.enableMiddleware || isBypassed(req)) {
			return next();
		}
		return middleware(req, res, next);
	};
}

export const helmetMiddleware = whenEnabled(
	helmet({
		contentSecurityPolicy: config.isProduction ? undefined : false,
	})
);

export const rateLimitMiddleware = whenEnabled(
	rateLimit({
		windowMs: config.rateLimit.windowMs,
		limit: config.rateLimit.maxRequests,
		standardHeaders: true,
		legacyHeaders: false,
		message: { status: 'error', statusCode: 429, code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
	})
);

// The public lookup API is read-only apart from the batch endpoint
const corsOptions: cors.CorsOptions = {
	origin: (origin, callback) => {
		const allowed = config.cors.allowedOrigins;
		if (!origin || allowed.includes('*') || allowed.includes(origin)) {
			return callback(null, true);
		}
		callback(new Error('Not allowed by CORS'));
	},
	methods: ['GET', 'POST'],
	optionsSuccessStatus: 200,
};

export const corsMiddleware = whenEnabled(cors(corsOptions));
