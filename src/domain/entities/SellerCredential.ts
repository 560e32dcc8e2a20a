/**
 * Credencial de longa duração de um seller (selling partner) autorizado.
 * Um registro por `partnerId`; `refreshToken` é sobrescrito a cada nova
 * autorização e `createdAt` nunca muda depois do primeiro insert.
 */
export interface SellerCredential {
  id: number;
  partnerId: string;
  refreshToken: string;
  createdAt: Date;
}
