// Request fields set by our own middleware.

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
