import { BadRequestException, ValidationError } from '@nestjs/common';
import validationOptions from './validation-options';

describe('validationOptions', () => {
  it('should flatten constraints and nest child errors by property', () => {
    const errors: ValidationError[] = [
      {
        property: 'note',
        constraints: {
          isNotEmpty: 'note should not be empty',
          isString: 'note must be a string',
        },
        children: [],
      },
      {
        property: 'account',
        children: [
          {
            property: 'username',
            constraints: { isString: 'username must be a string' },
            children: [],
          },
        ],
      },
    ];

    const exception = validationOptions.exceptionFactory?.(errors);

    expect(exception).toBeInstanceOf(BadRequestException);
    if (!(exception instanceof BadRequestException)) return;
    expect(exception.getResponse()).toEqual({
      status: 400,
      errors: {
        note: 'note should not be empty, note must be a string',
        account: { username: 'username must be a string' },
      },
    });
  });
});
