export type JSONSchema = {
  definitions?: Record<string, any>;
  [key: string]: any;
};

export type IValidationRight = {
  valid: true;
};

export type ValidationLeft<T = string[]> = {
  valid: false;
  errors: T;
};

export type ValidationResponse<E = string[]> = ValidationLeft<E> | IValidationRight;

export type MicroValidator<T = unknown, E = string[]> = {
  validate: (data: T) => ValidationResponse<E>;
  toJSONSchema?: () => JSONSchema;
};
