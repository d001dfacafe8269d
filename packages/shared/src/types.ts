export type ItemFields = {
  name: string;
  description?: string;
};

export type Item = ItemFields & {
  id: number;
};

export type HealthResponse = {
  status: "ok";
  env: string;
};

export type ErrorResponse = {
  statusCode: number;
  error: string;
  message: string;
};
