import QRCode from 'qrcode'

export const generateQRCode = (text: string): Promise<Buffer> => {
  return QRCode.toBuffer(text, {
    type: 'png',
    errorCorrectionLevel: 'M',
    margin: 4,
    scale: 6
  })
}
