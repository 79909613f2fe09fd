/**
 * Erro padrao para respostas controladas da API.
 *
 * Serializado no "envelope" de erro: `{ error: { codigo, mensagem, detalhes? } }`.
 *
 * Notas:
 * - `codigo` e estavel (orientado a maquina) para que clientes possam mapea-lo.
 * - `detalhes` costuma carregar o `flatten()` de um erro Zod.
 */
export class ErroAplicacao extends Error {
  codigo: string;
  estadoHttp: number;
  detalhes?: unknown;

  constructor(codigo: string, mensagem: string, estadoHttp = 400, detalhes?: unknown) {
    super(mensagem);
    this.name = 'ErroAplicacao';
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalhes = detalhes;
  }
}
