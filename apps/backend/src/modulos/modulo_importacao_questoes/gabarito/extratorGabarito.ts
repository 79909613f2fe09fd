/**
 * Extrator de gabarito: localiza tabelas/listas de respostas e devolve
 * `numero -> letra`.
 *
 * Recebe linhas limpas (sem o filtro de ruido: linhas de numeros e letras
 * soltas sao justamente o formato da tabela). Precedencia: a primeira entrada
 * encontrada para um numero vale.
 */
import type { ConfiguracaoExtracao } from '../configuracaoExtracao';
import { ehLetraAlternativa, type LetraAlternativa, type MapaGabarito } from '../tipos';

type ConfiguracaoGabarito = Pick<
  ConfiguracaoExtracao,
  'palavraChaveGabarito' | 'janelaGabarito' | 'minimoColunasTabela' | 'maximoQuestoes'
>;

const MARCAS_ANULADA = new Set(['*', 'X', 'ANULADA', 'NULA']);
const PAR_EM_LINHA = /(?<!\d)(\d{1,3})\s*[-.):–=]\s*([A-E])(?![A-Za-z])/g;

function tokens(linha: string): string[] {
  return linha.split(/\s+/).filter(Boolean);
}

/** `1 2 3 4 5`: inteiros crescentes e consecutivos. */
function linhaDeNumeros(linha: string, minimo: number): number[] | null {
  const partes = tokens(linha);
  if (partes.length < minimo || !partes.every((parte) => /^\d{1,3}$/.test(parte))) return null;
  const numeros = partes.map((parte) => Number.parseInt(parte, 10));
  for (let i = 1; i < numeros.length; i += 1) {
    if (numeros[i] !== (numeros[i - 1] ?? 0) + 1) return null;
  }
  return numeros;
}

/** `A C * B D`: letras ou marcas de anulacao (que ocupam a posicao sem gerar entrada). */
function linhaDeLetras(linha: string): Array<LetraAlternativa | null> | null {
  const partes = tokens(linha);
  if (partes.length === 0) return null;
  const saida: Array<LetraAlternativa | null> = [];
  for (const parte of partes) {
    const normalizada = parte.toUpperCase();
    if (ehLetraAlternativa(parte)) saida.push(parte);
    else if (MARCAS_ANULADA.has(normalizada)) saida.push(null);
    else return null;
  }
  return saida;
}

/** `1 A 2 B 3 C`: pares separados so por espacos. */
function linhaDePares(linha: string): Array<[number, LetraAlternativa]> | null {
  const partes = tokens(linha);
  if (partes.length === 0 || partes.length % 2 !== 0) return null;
  const pares: Array<[number, LetraAlternativa]> = [];
  for (let i = 0; i < partes.length; i += 2) {
    const numero = partes[i] ?? '';
    const letra = partes[i + 1];
    if (!/^\d{1,3}$/.test(numero) || !ehLetraAlternativa(letra)) return null;
    pares.push([Number.parseInt(numero, 10), letra]);
  }
  return pares;
}

/**
 * `1-A, 2-B; 3) C`: so vale se a linha, tirando os pares, a palavra-chave e a
 * pontuacao de separacao, ficar vazia. Evita ler "3. A lei..." como resposta.
 */
function linhaDeParesEmLinha(linha: string, palavraChave: RegExp): Array<[number, LetraAlternativa]> | null {
  const pares: Array<[number, LetraAlternativa]> = [];
  for (const casamento of linha.matchAll(PAR_EM_LINHA)) {
    const letra = casamento[2];
    if (!ehLetraAlternativa(letra)) continue;
    pares.push([Number.parseInt(casamento[1] ?? '', 10), letra]);
  }
  if (pares.length === 0) return null;

  const resto = linha
    .replace(PAR_EM_LINHA, ' ')
    .replace(new RegExp(palavraChave.source, palavraChave.flags.replace('g', '') + 'g'), ' ')
    .replace(/[\s,;:|.\-–]+/g, '');
  return resto === '' ? pares : null;
}

export function extrairGabarito(linhas: readonly string[], config: ConfiguracaoGabarito): MapaGabarito {
  const mapa: MapaGabarito = new Map();
  const visitadas = new Set<number>();

  const registrar = (numero: number, letra: LetraAlternativa | null) => {
    if (letra === null || !Number.isInteger(numero)) return;
    if (numero < 1 || numero > config.maximoQuestoes) return;
    if (!mapa.has(numero)) mapa.set(numero, letra);
  };

  for (let inicio = 0; inicio < linhas.length; inicio += 1) {
    if (!config.palavraChaveGabarito.test(linhas[inicio] ?? '')) continue;

    const fim = Math.min(linhas.length, inicio + config.janelaGabarito);
    for (let i = inicio; i < fim; i += 1) {
      if (visitadas.has(i)) continue;
      visitadas.add(i);
      const linha = linhas[i] ?? '';

      const numeros = linhaDeNumeros(linha, config.minimoColunasTabela);
      const letras = numeros ? linhaDeLetras(linhas[i + 1] ?? '') : null;
      if (numeros && letras) {
        numeros.forEach((numero, posicao) => registrar(numero, letras[posicao] ?? null));
        visitadas.add(i + 1);
        continue;
      }

      const pares = linhaDePares(linha) ?? linhaDeParesEmLinha(linha, config.palavraChaveGabarito);
      pares?.forEach(([numero, letra]) => registrar(numero, letra));
    }
  }

  return mapa;
}
