import 'reflect-metadata';

export * from './modules/captcha-client';
