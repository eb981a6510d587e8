import { Request, Response } from 'express';

export interface MockResponse {
  res: Response;
  status: jest.Mock;
  json: jest.Mock;
}

// Only the fields the middleware under test reads are filled in.
export const mockRequest = (fields: Partial<Request> = {}): Request =>
  ({ headers: {}, method: 'GET', path: '/', ...fields }) as unknown as Request;

export const mockResponse = (): MockResponse => {
  const status = jest.fn();
  const json = jest.fn();
  const res = { status, json } as unknown as Response;
  status.mockReturnValue(res);
  json.mockReturnValue(res);
  return { res, status, json };
};
