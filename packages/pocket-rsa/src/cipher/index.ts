export { encrypt, decrypt } from './cipher.js'
