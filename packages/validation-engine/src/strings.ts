export const REQUIRED_FIELD_ERROR = "This field is required.";
export const INVALID_VALUE_ERROR = "Enter a valid value.";
export const INVALID_CHOICE_ERROR = "Select a valid choice. That choice is not one of the available choices.";

export const invalidListChoiceError = (value: string) =>
  `Select a valid choice. ${value} is not one of the available choices.`;

export const maxLengthError = (limit: number, length: number) =>
  `Ensure this value has at most ${limit} characters (it has ${length}).`;

export const minLengthError = (limit: number, length: number) =>
  `Ensure this value has at least ${limit} characters (it has ${length}).`;

export const minChoicesError = (limit: number) => `You must select at least ${limit} choices.`;

export const maxChoicesError = (limit: number) => `You can't select more than ${limit} choices.`;

export const FORM_INVALID_ERROR = "One or more fields have an error. Please check and try again.";
