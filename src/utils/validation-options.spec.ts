import { generateErrors } from './validation-options';

describe('generateErrors', () => {
  it('should join the constraint messages of each property', () => {
    expect(
      generateErrors([
        {
          property: 'icu_beds',
          constraints: {
            min: 'icu_beds must not be less than 0',
            isInt: 'icu_beds must be an integer number',
          },
          children: [],
        },
        {
          property: 'name',
          constraints: { isNotEmpty: 'name should not be empty' },
        },
      ]),
    ).toEqual({
      icu_beds:
        'icu_beds must not be less than 0, icu_beds must be an integer number',
      name: 'name should not be empty',
    });
  });

  it('should nest errors of child objects', () => {
    expect(
      generateErrors([
        {
          property: 'address',
          children: [
            {
              property: 'city',
              constraints: { isString: 'city must be a string' },
            },
          ],
        },
      ]),
    ).toEqual({ address: { city: 'city must be a string' } });
  });
});
