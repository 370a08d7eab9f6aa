export const title = 'not a component';
