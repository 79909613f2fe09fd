/**
 * Conexao com MongoDB via Mongoose.
 *
 * Decisoes:
 * - Sem URI configurada nao ha conexao (a API sobe e os scripts de importacao
 *   rodam em modo "somente relatorio").
 * - `strictQuery` evita consultas com campos nao declarados no schema.
 * - Em caso de erro, registra e aborta o arranque (fail-fast).
 */
import mongoose from 'mongoose';
import { configuracao } from '../../configuracao';
import { log, logError } from '../logging/logger';

export async function conectarBaseDados(uri: string = configuracao.mongoUri): Promise<boolean> {
  if (!uri) {
    log('warn', 'MONGODB_URI nao definido; conexao com MongoDB omitida');
    return false;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(uri);
    log('ok', 'Conexao com MongoDB estabelecida');
    return true;
  } catch (erro) {
    logError('Falha na conexao com MongoDB', erro);
    throw erro;
  }
}

export async function desconectarBaseDados(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
}

export function estadoBaseDados(): number {
  return Number(mongoose.connection.readyState);
}
