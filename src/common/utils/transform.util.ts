import { TransformFnParams } from 'class-transformer';

/** Reads the raw value, so the string 'false' stays false under implicit conversion. */
export const toBoolean = ({ obj, key }: TransformFnParams): boolean => {
  const raw: unknown = obj[key];
  return raw === true || raw === 'true' || raw === '1';
};
