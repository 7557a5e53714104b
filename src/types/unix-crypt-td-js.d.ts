declare module 'unix-crypt-td-js' {
  /** Traditional DES-based crypt(3); only the first two salt characters are used */
  function crypt(password: string, salt: string): string;
  export = crypt;
}
