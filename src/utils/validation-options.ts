import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

export type ValidationErrorTree = {
  [property: string]: string | ValidationErrorTree;
};

/**
 * Nested DTO errors keyed by property, constraint messages joined per leaf
 */
export function generateErrors(
  errors: ValidationError[],
): ValidationErrorTree {
  const tree: ValidationErrorTree = {};
  for (const error of errors) {
    const children = error.children ?? [];
    tree[error.property] =
      children.length > 0
        ? generateErrors(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return tree;
}

const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) => {
    return new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: generateErrors(errors),
    });
  },
};

export default validationOptions;
