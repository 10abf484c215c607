export const MODEL_GENDERS = ['male', 'female', 'non-binary'];
