import { KmsError, type KmsErrorCode } from '@keyseal/core';
import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from '@nestjs/common';
import type { Response } from 'express';

const KMS_ERROR_STATUS: Record<KmsErrorCode, HttpStatus> = {
	UNSUPPORTED_OPERATION: HttpStatus.NOT_IMPLEMENTED,
	UNSEAL_FAILED: HttpStatus.BAD_REQUEST,
	KMS_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
	INVALID_CONTEXT: HttpStatus.BAD_REQUEST,
	INVALID_MASTER_KEY: HttpStatus.INTERNAL_SERVER_ERROR,
	FATAL_PRIMITIVE_FAILURE: HttpStatus.INTERNAL_SERVER_ERROR,
};

function messageOf(body: object, fallback: string): string {
	const message: unknown = Reflect.get(body, 'message');
	if (typeof message === 'string') return message;
	if (Array.isArray(message)) return message.join(', ');
	return fallback;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(GlobalExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();

		let status = HttpStatus.INTERNAL_SERVER_ERROR;
		let message = 'Internal server error';
		let code: KmsErrorCode | undefined;

		if (exception instanceof HttpException) {
			status = exception.getStatus();
			const exResponse = exception.getResponse();
			message =
				typeof exResponse === 'string' ? exResponse : messageOf(exResponse, exception.message);
		} else if (exception instanceof KmsError) {
			status = KMS_ERROR_STATUS[exception.code];
			code = exception.code;
			if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
				this.logger.error(exception.message, exception.stack);
			} else {
				message = exception.message;
			}
		} else if (exception instanceof Error) {
			this.logger.error(exception.message, exception.stack);
		} else {
			this.logger.error(`Non-Error exception caught: ${String(exception)}`);
		}

		const responseBody: Record<string, unknown> = {
			statusCode: status,
			message,
			timestamp: new Date().toISOString(),
		};

		if (code !== undefined) {
			responseBody.code = code;
		}

		response.status(status).json(responseBody);
	}
}
