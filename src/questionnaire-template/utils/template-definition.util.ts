import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { DomainError } from '../../common/errors/domain.error';
import { CreateQuestionnaireTemplateDto } from '../dto/questionnaire-template.dto';

const flatten = (errors: ValidationError[], prefix = ''): string[] =>
  errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = error.constraints ? [`${path}: ${Object.values(error.constraints).join(', ')}`] : [];
    return [...own, ...flatten(error.children ?? [], path)];
  });

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Validates an already-parsed template definition against the create rules. */
export const toTemplateDefinition = (plain: unknown): CreateQuestionnaireTemplateDto => {
  if (!isRecord(plain)) {
    throw DomainError.validation('invalid template format: expected an object', 'invalid_format');
  }

  const definition = plainToInstance(CreateQuestionnaireTemplateDto, plain);
  const errors = validateSync(definition, { whitelist: true });
  if (errors.length > 0) {
    throw DomainError.validation(`invalid template: ${flatten(errors).join('; ')}`, 'missing_fields');
  }
  return definition;
};

export const parseTemplateDefinition = (content: string): CreateQuestionnaireTemplateDto => {
  let plain: unknown;
  try {
    plain = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw DomainError.validation(`invalid template format: ${reason}`, 'invalid_format');
  }
  return toTemplateDefinition(plain);
};
