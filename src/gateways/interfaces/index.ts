export * from './IProviderGateway';
