export const RESEND_CLIENT = Symbol('RESEND_CLIENT');
