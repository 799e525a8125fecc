export { drive } from '@googleapis/drive'
