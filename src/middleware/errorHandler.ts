import { Request, Response, NextFunction } from 'express';
import { AppError, InternalServerError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { config } from '../config';

export const errorHandler = (
	err: Error,
	req: Request,
	res: Response,
	_next: NextFunction
): void => {
	let appError: AppError;

	if (err instanceof AppError) {
		appError = err;
	} else if (err instanceof SyntaxError && 'body' in err) {
		// Malformed JSON body from express.json()
		appError = new ValidationError('Request body is not valid JSON');
	} else {
		appError = new InternalServerError();
	}

	const { statusCode, code, message, isOperational } = appError;

	if (isOperational) {
		logger.warn(message, { method: req.method, path: req.path, statusCode });
	} else {
		logger.error(err.stack || err.message, { method: req.method, path: req.path, code });
	}

	res.status(statusCode).json({
		status: 'error',
		statusCode,
		code,
		// Data errors keep their code but not their detail
		message: isOperational ? message : 'Something went wrong',
		...(config.isDevelopment && { stack: err.stack }),
	});
};

export const notFoundHandler = (req: Request, res: Response): void => {
	res.status(404).json({
		status: 'error',
		statusCode: 404,
		code: 'NOT_FOUND',
		message: `Route ${req.method} ${req.path} not found`,
	});
};
