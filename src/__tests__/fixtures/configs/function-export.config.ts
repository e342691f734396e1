export default () => ({
  bucket: ['function', 'bucket'].join('-'),
});
