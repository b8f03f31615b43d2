import { ConfigService } from '@nestjs/config';
import { NextFunction, Request, Response } from 'express';
import { HttpsEnforcementMiddleware } from './https-enforcement.middleware';
import { AllConfigType } from '../config/config.type';

describe('HttpsEnforcementMiddleware', () => {
  const buildMiddleware = (nodeEnv: string) =>
    new HttpsEnforcementMiddleware(
      new ConfigService<AllConfigType>({ app: { nodeEnv } }),
    );

  const buildRequest = (secure: boolean, forwardedProto?: string) =>
    ({
      secure,
      protocol: secure ? 'https' : 'http',
      get: (header: string) =>
        header === 'x-forwarded-proto' ? forwardedProto : undefined,
    }) as unknown as Request;

  const buildResponse = () => {
    const response = {
      status: jest.fn(),
      json: jest.fn(),
    };
    response.status.mockReturnValue(response);
    return response;
  };

  it('should let plain HTTP through outside production', () => {
    const next: NextFunction = jest.fn();
    const response = buildResponse();

    buildMiddleware('development').use(
      buildRequest(false),
      response as unknown as Response,
      next,
    );

    expect(next).toHaveBeenCalled();
    expect(response.status).not.toHaveBeenCalled();
  });

  it('should reject plain HTTP in production', () => {
    const next: NextFunction = jest.fn();
    const response = buildResponse();

    buildMiddleware('production').use(
      buildRequest(false),
      response as unknown as Response,
      next,
    );

    expect(next).not.toHaveBeenCalled();
    expect(response.status).toHaveBeenCalledWith(403);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 403,
      message: 'HTTPS is required for all requests in production.',
      error: 'Forbidden',
    });
  });

  it('should trust X-Forwarded-Proto from the load balancer', () => {
    const next: NextFunction = jest.fn();

    buildMiddleware('production').use(
      buildRequest(false, 'https'),
      buildResponse() as unknown as Response,
      next,
    );

    expect(next).toHaveBeenCalled();
  });
});
