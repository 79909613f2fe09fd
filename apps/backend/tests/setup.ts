// Setup comum para os testes do backend.
process.env.NODE_ENV = 'test';

// Muitas requisicoes em pouco tempo nos testes de integracao.
process.env.RATE_LIMIT_LIMIT = '100000';

// Sem banco nos testes: o app recebe um repositorio em memoria.
process.env.MONGODB_URI = '';
