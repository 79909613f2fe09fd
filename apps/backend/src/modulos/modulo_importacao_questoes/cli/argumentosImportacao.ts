/**
 * Argumentos de linha de comando do script de importacao.
 */
import { ErroAplicacao } from '../../../compartilhado/erros/erroAplicacao';

export type ArgumentosImportacao = {
  diretorio?: string;
  arquivos: string[];
  legados: string[];
  saida?: string;
  persistir: boolean;
  maximoQuestoes?: number;
  ajuda: boolean;
};

export const USO_IMPORTACAO =
  'Uso: npm run importar -- (--dir <pasta> | --arquivo <arquivo> [--arquivo <arquivo> ...]) ' +
  '[--legado <json>] [--saida <json>] [--persistir] [--maximo-questoes N]';

export function lerArgumentosImportacao(argv: readonly string[]): ArgumentosImportacao {
  const args = argv.slice(2);
  const saida: ArgumentosImportacao = { arquivos: [], legados: [], persistir: false, ajuda: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const valor = args[i + 1];

    if (arg === '--ajuda' || arg === '-h' || arg === '--help') {
      saida.ajuda = true;
      continue;
    }
    if (arg === '--persistir') {
      saida.persistir = true;
      continue;
    }
    if (arg === '--dir' && valor) {
      saida.diretorio = valor;
      i += 1;
      continue;
    }
    if ((arg === '--arquivo' || arg === '-a') && valor) {
      saida.arquivos.push(valor);
      i += 1;
      continue;
    }
    if (arg === '--legado' && valor) {
      saida.legados.push(valor);
      i += 1;
      continue;
    }
    if (arg === '--saida' && valor) {
      saida.saida = valor;
      i += 1;
      continue;
    }
    if (arg === '--maximo-questoes' && valor) {
      const numero = Number(valor);
      if (!Number.isInteger(numero) || numero < 1) {
        throw new ErroAplicacao('ARGUMENTO_INVALIDO', `--maximo-questoes invalido: ${valor}`);
      }
      saida.maximoQuestoes = numero;
      i += 1;
      continue;
    }
    throw new ErroAplicacao('ARGUMENTO_INVALIDO', `Argumento nao reconhecido: ${arg ?? ''}`);
  }

  if (!saida.ajuda && !saida.diretorio && saida.arquivos.length === 0 && saida.legados.length === 0) {
    throw new ErroAplicacao('ARGUMENTO_INVALIDO', 'Informe --dir, --arquivo ou --legado');
  }
  return saida;
}
